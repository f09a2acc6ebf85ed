export {
  GatewayServer,
  DEFAULT_GATEWAY_CONFIG,
  SERVICE_NAME,
  parseCommandBody,
  type GatewayConfig,
  type ServerMessage,
} from './gateway-server.js';
