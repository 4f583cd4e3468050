export type { BrokerEndpoint, BrokerProtocol } from './endpoint.js';
export {
  resolveEndpoint,
  endpointFromEnv,
  defaultClientId,
  DEFAULT_BROKER_HOST,
  DEFAULT_BROKER_PORT,
  DEFAULT_KEEPALIVE_SEC,
} from './endpoint.js';
