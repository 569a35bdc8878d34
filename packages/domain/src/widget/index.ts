export * from './origin-allowlist.js';
export * from './session-store.js';
export * from './captcha-service.js';
export * from './abuse-throttle.js';
export * from './widget-gateway.js';
