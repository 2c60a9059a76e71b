import { readFileSync } from 'node:fs';
import { connectAsync } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import type { Logger } from 'pino';
import type {
  BrokerTransport,
  CloseListener,
  ConnectionConfig,
  MessageHandler,
  QoS,
} from '../../domain/index.js';

type PublishPacket = Parameters<MqttClient['handleMessage']>[0];

/** Granted-QoS value a broker returns for a refused subscription. */
const SUBSCRIPTION_REFUSED = 128;

const CONNECT_TIMEOUT_MS = 30_000;

/** `mqtt://host:port`, or `mqtts://` when TLS settings are present. */
export function brokerUrl(config: ConnectionConfig): string {
  const scheme = config.tls ? 'mqtts' : 'mqtt';
  const host = config.host.includes(':') ? `[${config.host}]` : config.host;
  return `${scheme}://${host}:${config.port}`;
}

/**
 * Maps the pass-through parts of a ConnectionConfig onto MQTT.js options.
 *
 * Library reconnects are disabled: a dropped connection must reach the
 * bridge as a close, not be papered over.
 */
export function buildClientOptions(config: ConnectionConfig): IClientOptions {
  const options: IClientOptions = {
    reconnectPeriod: 0,
    connectTimeout: CONNECT_TIMEOUT_MS,
    clean: true,
  };

  if (config.client_id !== undefined) {
    options.clientId = config.client_id;
  }

  if (config.credentials) {
    options.username = config.credentials.username;
    if (config.credentials.password !== undefined) {
      options.password = config.credentials.password;
    }
  }

  const tls = config.tls;
  if (tls) {
    if (tls.ca_certs !== undefined) options.ca = readFileSync(tls.ca_certs);
    if (tls.client_cert !== undefined) options.cert = readFileSync(tls.client_cert);
    if (tls.client_key !== undefined) options.key = readFileSync(tls.client_key);
    if (tls.reject_unauthorized !== undefined) options.rejectUnauthorized = tls.reject_unauthorized;
  }

  return options;
}

function toBuffer(payload: PublishPacket['payload']): Buffer {
  return typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;
}

/**
 * BrokerTransport backed by an MQTT.js client.
 *
 * One instance owns one client for one connection attempt. Inbound
 * messages are routed through the client's `handleMessage` hook, whose
 * completion callback is held until the bridge has finished with the
 * message; MQTT.js does not process the next incoming packet before that,
 * so order holds and a slow consumer slows the socket instead of
 * buffering unboundedly.
 */
export class MqttTransport implements BrokerTransport {
  private readonly config: ConnectionConfig;
  private readonly log: Logger;
  private readonly closeListeners: CloseListener[] = [];
  private client: MqttClient | null = null;
  private lastError: Error | undefined;

  constructor(config: ConnectionConfig, log: Logger) {
    this.config = config;
    this.log = log;
  }

  async connect(): Promise<void> {
    const url = brokerUrl(this.config);

    // allowRetries=false: reject on the first failed attempt
    const client = await connectAsync(url, buildClientOptions(this.config), false);

    client.on('error', (err: Error) => {
      this.lastError = err;
      this.log.warn({ err, url }, 'MQTT client error');
    });

    client.on('close', () => {
      const error = this.lastError;
      for (const listener of this.closeListeners) {
        listener(error);
      }
    });

    this.client = client;
    this.log.info({ url }, 'MQTT connection established');
  }

  async subscribe(topic: string, qos: QoS, handler: MessageHandler): Promise<void> {
    const client = this.requireClient();

    client.handleMessage = (packet, callback) => {
      handler({ topic: packet.topic, payload: toBuffer(packet.payload) }).then(
        () => callback(),
        (err: unknown) => callback(err instanceof Error ? err : new Error(String(err))),
      );
    };

    const granted = await client.subscribeAsync(topic, { qos });
    const refused = granted.find((grant) => grant.qos === SUBSCRIPTION_REFUSED);
    if (refused) {
      throw new Error(`Broker refused subscription to "${refused.topic}"`);
    }

    this.log.debug({ topic, granted }, 'MQTT subscription granted');
  }

  async unsubscribe(topic: string): Promise<void> {
    if (!this.client || !this.client.connected) return;
    await this.client.unsubscribeAsync(topic);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;

    this.client = null;
    await client.endAsync();
    this.log.info({ url: brokerUrl(this.config) }, 'MQTT connection closed');
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  private requireClient(): MqttClient {
    if (!this.client) {
      throw new Error('MQTT transport is not connected');
    }
    return this.client;
  }
}

/** TransportFactory for EventBridge. */
export function createMqttTransport(log: Logger): (config: ConnectionConfig) => BrokerTransport {
  return (config) => new MqttTransport(config, log);
}
