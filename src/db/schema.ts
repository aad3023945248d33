/**
 * Schema DDL. Timestamps are epoch milliseconds; booleans are 0/1.
 */

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS items (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    external_listing_id TEXT,
    sku TEXT,
    custom_sku TEXT,
    title TEXT NOT NULL,
    price REAL,
    cost_basis REAL,
    quantity INTEGER NOT NULL DEFAULT 1,
    active INTEGER NOT NULL DEFAULT 1,
    location_code TEXT,
    ended_at INTEGER,
    end_reason TEXT,
    sold_at INTEGER,
    last_event_at INTEGER,
    last_synced_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sales (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    external_order_id TEXT NOT NULL,
    listing_id TEXT,
    title TEXT,
    sku TEXT,
    custom_sku TEXT,
    price REAL NOT NULL DEFAULT 0,
    quantity INTEGER NOT NULL DEFAULT 1,
    cost REAL,
    marketplace_fee REAL NOT NULL DEFAULT 0,
    payment_fee REAL NOT NULL DEFAULT 0,
    shipping_cost REAL NOT NULL DEFAULT 0,
    other_fees REAL NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'pending',
    item_id TEXT,
    match_method TEXT,
    buyer_username TEXT,
    tracking_number TEXT,
    carrier TEXT,
    sold_at INTEGER,
    shipped_at INTEGER,
    delivered_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    UNIQUE (user_id, external_order_id)
  );

  CREATE TABLE IF NOT EXISTS raw_events (
    id TEXT PRIMARY KEY,
    user_id TEXT,
    source TEXT NOT NULL,
    topic TEXT NOT NULL,
    external_event_id TEXT,
    dedup_key TEXT NOT NULL UNIQUE,
    object_id TEXT,
    raw_payload TEXT NOT NULL,
    event_json TEXT,
    status TEXT NOT NULL,
    error_kind TEXT,
    error TEXT,
    retry_count INTEGER NOT NULL DEFAULT 0,
    duplicate_count INTEGER NOT NULL DEFAULT 0,
    mutation TEXT,
    received_at INTEGER NOT NULL,
    occurred_at INTEGER,
    started_at INTEGER,
    processed_at INTEGER,
    next_attempt_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS marketplace_credentials (
    user_id TEXT PRIMARY KEY,
    marketplace_user_id TEXT NOT NULL,
    encrypted_access_token TEXT NOT NULL,
    encrypted_refresh_token TEXT NOT NULL,
    access_expires_at INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'active',
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS subscriptions (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    protocol TEXT NOT NULL,
    topic TEXT NOT NULL,
    external_subscription_id TEXT,
    destination_id TEXT,
    destination_url TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'enabled',
    expires_at INTEGER NOT NULL,
    event_count INTEGER NOT NULL DEFAULT 0,
    last_event_at INTEGER,
    error_count INTEGER NOT NULL DEFAULT 0,
    last_error TEXT,
    last_renewed_at INTEGER,
    created_at INTEGER NOT NULL,
    UNIQUE (user_id, protocol, topic)
  );

  CREATE TABLE IF NOT EXISTS auto_relist_rules (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    item_id TEXT,
    listing_id TEXT NOT NULL,
    mode TEXT NOT NULL,
    cadence TEXT NOT NULL,
    custom_interval_days INTEGER,
    decay_type TEXT,
    decay_value REAL,
    floor_price REAL,
    current_price REAL NOT NULL,
    run_immediately INTEGER NOT NULL DEFAULT 0,
    enabled INTEGER NOT NULL DEFAULT 1,
    manual_trigger_requested INTEGER NOT NULL DEFAULT 0,
    next_run_at INTEGER,
    last_run_at INTEGER,
    last_error TEXT,
    run_count INTEGER NOT NULL DEFAULT 0,
    success_count INTEGER NOT NULL DEFAULT 0,
    failure_count INTEGER NOT NULL DEFAULT 0,
    skip_count INTEGER NOT NULL DEFAULT 0,
    consecutive_errors INTEGER NOT NULL DEFAULT 0,
    require_positive_quantity INTEGER NOT NULL DEFAULT 1,
    min_hours_since_last_order INTEGER NOT NULL DEFAULT 48,
    pause_on_error INTEGER NOT NULL DEFAULT 1,
    max_consecutive_errors INTEGER NOT NULL DEFAULT 3,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS auto_relist_history (
    id TEXT PRIMARY KEY,
    rule_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    item_id TEXT,
    old_listing_id TEXT NOT NULL,
    new_listing_id TEXT,
    old_price REAL NOT NULL,
    new_price REAL NOT NULL,
    status TEXT NOT NULL,
    error TEXT,
    skip_reason TEXT,
    started_at INTEGER NOT NULL,
    finished_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS watermarks (
    user_id TEXT NOT NULL,
    stream TEXT NOT NULL,
    cursor_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (user_id, stream)
  );

  CREATE TABLE IF NOT EXISTS backfill_runs (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    status TEXT NOT NULL,
    reason TEXT,
    incomplete INTEGER NOT NULL DEFAULT 0,
    windows_scanned INTEGER NOT NULL DEFAULT 0,
    orders_collected INTEGER NOT NULL DEFAULT 0,
    oldest_window_start INTEGER,
    started_at INTEGER NOT NULL,
    finished_at INTEGER,
    last_checkpoint_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS failed_imports (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    external_id TEXT NOT NULL,
    payload TEXT,
    error TEXT NOT NULL,
    attempts INTEGER NOT NULL DEFAULT 1,
    resolved_at INTEGER,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    type TEXT NOT NULL,
    title TEXT NOT NULL,
    message TEXT NOT NULL,
    source TEXT NOT NULL,
    read_at INTEGER,
    created_at INTEGER NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_items_active_listing
    ON items(user_id, external_listing_id) WHERE active = 1 AND external_listing_id IS NOT NULL;
  CREATE INDEX IF NOT EXISTS idx_items_user_listing ON items(user_id, external_listing_id);
  CREATE INDEX IF NOT EXISTS idx_items_user_active ON items(user_id, active);
  CREATE INDEX IF NOT EXISTS idx_sales_user_item ON sales(user_id, item_id);
  CREATE INDEX IF NOT EXISTS idx_raw_events_status ON raw_events(status, next_attempt_at);
  CREATE INDEX IF NOT EXISTS idx_raw_events_user ON raw_events(user_id, received_at);
  CREATE INDEX IF NOT EXISTS idx_subscriptions_expiry ON subscriptions(status, expires_at);
  CREATE INDEX IF NOT EXISTS idx_relist_rules_due ON auto_relist_rules(enabled, next_run_at);
  CREATE INDEX IF NOT EXISTS idx_failed_imports_user ON failed_imports(user_id, resolved_at);
  CREATE INDEX IF NOT EXISTS idx_notifications_user ON notifications(user_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_credentials_marketplace_user ON marketplace_credentials(marketplace_user_id);
`;
