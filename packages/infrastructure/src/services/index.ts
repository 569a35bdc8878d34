export {
  GeoIpRegionLocator,
  isPrivateAddress,
  type GeoIpRegionLocatorOptions,
} from './GeoIpRegionLocator.js';
export {
  WebhookNotifier,
  signWebhookBody,
  type WebhookEventType,
  type WebhookNotifierOptions,
  type WebhookPayload,
} from './WebhookNotifier.js';
