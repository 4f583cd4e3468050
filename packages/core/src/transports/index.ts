export type { Transport, TransportHandle, MessageCallback, DisconnectCallback } from './Transport.js';
export type { BaseTransportOptions } from './BaseTransport.js';
export { BaseTransport, MQTT_MAX_PAYLOAD_BYTES } from './BaseTransport.js';
export type { MqttClientLike, MqttTransportOptions, PublishPacketInfo, QoS } from './MqttTransport.js';
export { MqttTransport, buildClientOptions, classifyConnectError } from './MqttTransport.js';
