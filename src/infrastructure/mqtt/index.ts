export { MqttTransport, createMqttTransport, brokerUrl, buildClientOptions } from './mqtt-transport.js';
