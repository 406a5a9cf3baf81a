// Shared limits and layout baselines.
// Keep these centralized so scanner/parser/composer/emitter defaults stay in sync.
export const DEFAULT_MAX_DEPTH = 1000;
export const DEFAULT_MAX_ANCHORS = 10_000;

// 100MB default ceiling for a whole input stream.
export const DEFAULT_MAX_DOCUMENT_SIZE = 104_857_600;
export const DEFAULT_MAX_STRING_LENGTH = 10_485_760;
export const DEFAULT_MAX_ALIAS_DEPTH = 100;
export const DEFAULT_MAX_COLLECTION_SIZE = 1_000_000;
export const DEFAULT_MAX_COMPLEXITY_SCORE = 1_000_000;

// A simple key must fit on one line and within this many characters.
export const MAX_SIMPLE_KEY_LENGTH = 1024;

// The timeout clock is polled once per this many scanned tokens or composed nodes.
export const TIMEOUT_POLL_INTERVAL = 64;

// 80 columns remains the default terminal-oriented emission target.
export const TERMINAL_WIDTH = 80;
export const DEFAULT_INDENT = 2;

// Leaf collections with at most this many scalars may be emitted in flow style
// when the emitter runs in 'auto' mode.
export const AUTO_FLOW_MAX_ITEMS = 8;

export const DEFAULT_ANCHOR_PREFIX = 'anchor';

export const CORE_TAG_PREFIX = 'tag:yaml.org,2002:';
