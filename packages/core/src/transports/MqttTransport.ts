import type { IClientOptions } from 'mqtt';
import type { BrokerEndpoint } from '../config/index.js';
import type { Result, Topic } from '../types/index.js';
import type { BaseTransportOptions } from './BaseTransport.js';
import type { TransportHandle } from './Transport.js';

import { connect as mqttConnect } from 'mqtt';
import { ConnectError, SubscriptionError } from '../errors/index.js';
import { Deque } from '../pipe/Deque.js';
import { err, ok } from '../types/index.js';
import { BaseTransport } from './BaseTransport.js';

export type QoS = 0 | 1 | 2;

/** The parts of a PUBLISH packet the transport reads. */
export interface PublishPacketInfo {
  qos: QoS;
  dup: boolean;
  messageId?: number;
}

/**
 * The slice of `MqttClient` this transport drives. `mqtt.connect()` returns
 * one; tests hand in an in-process stand-in through `createClient`.
 */
export interface MqttClientLike {
  on(event: 'connect' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'message', listener: (topic: string, payload: Buffer, packet: PublishPacketInfo) => void): unknown;
  removeListener(event: 'connect' | 'close', listener: () => void): unknown;
  removeListener(event: 'error', listener: (error: Error) => void): unknown;
  removeListener(event: 'message', listener: (topic: string, payload: Buffer, packet: PublishPacketInfo) => void): unknown;
  end(force?: boolean): unknown;
  endAsync(): Promise<void>;
  publishAsync(topic: string, message: Buffer, opts: { qos: QoS }): Promise<unknown>;
  subscribeAsync(topic: string, opts: { qos: QoS }): Promise<{ qos: number }[]>;
  unsubscribeAsync(topic: string): Promise<unknown>;
}

interface AttachedClient {
  client: MqttClientLike;
  /** Removes the listeners installed by `attach`, leaving an error sink. */
  detach: () => void;
}

export interface MqttTransportOptions extends BaseTransportOptions {
  /**
   * Quality of service used for publishes and subscriptions.
   * @default 0
   */
  qos?: QoS;

  /**
   * How many recent QoS 1/2 message ids to remember when dropping broker
   * redeliveries (packets flagged `dup`).
   * @default 128
   */
  dedupWindow?: number;

  /** Client factory; defaults to `mqtt.connect`. */
  createClient?: (options: IClientOptions) => MqttClientLike;
}

const UNREACHABLE_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNRESET',
]);

/** Builds the `mqtt` client options for one connection attempt. */
export function buildClientOptions(endpoint: BrokerEndpoint, timeoutMs: number): IClientOptions {
  return {
    host: endpoint.host,
    port: endpoint.port,
    protocol: endpoint.protocol,
    keepalive: endpoint.keepaliveSec,
    clientId: endpoint.clientId,
    connectTimeout: timeoutMs,
    // the supervisor owns reconnecting
    reconnectPeriod: 0,
    clean: true,
  };
}

function errorCode(error: Error): string | number | undefined {
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    return error.code;
  }
  return undefined;
}

/**
 * Maps an error raised while opening a connection to a {@link ConnectError}.
 *
 * Numeric codes are CONNACK return/reason codes, i.e. the broker answered
 * and said no.
 */
export function classifyConnectError(error: Error, endpoint: BrokerEndpoint): ConnectError {
  const code = errorCode(error);
  const where = `${endpoint.host}:${endpoint.port}`;

  if (code === 'ECONNREFUSED' || typeof code === 'number') {
    return new ConnectError('refused', `Connection to ${where} refused: ${error.message}`, { cause: error });
  }
  if (typeof code === 'string' && UNREACHABLE_CODES.has(code)) {
    return new ConnectError('unreachable', `Broker ${where} unreachable: ${error.message}`, { cause: error });
  }
  return new ConnectError('unreachable', `Could not connect to ${where}: ${error.message}`, { cause: error });
}

function toUint8(buf: Buffer): Uint8Array {
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * {@link Transport} over MQTT 3.1.1 using the `mqtt` package.
 *
 * Each `connect()` creates a fresh client with automatic reconnect disabled;
 * a dropped connection is reported through `onDisconnect` and the client is
 * discarded.
 */
export class MqttTransport extends BaseTransport {
  private readonly clients = new Map<number, AttachedClient>();
  private readonly qos: QoS;
  private readonly createClient: (options: IClientOptions) => MqttClientLike;
  private readonly recentIds: Deque<number>;
  private readonly recentIdSet = new Set<number>();

  constructor(options: MqttTransportOptions = {}) {
    super(options);
    this.qos = options.qos ?? 0;
    this.createClient = options.createClient ?? mqttConnect;
    this.recentIds = new Deque<number>(options.dedupWindow ?? 128);
  }

  protected open(handle: TransportHandle, timeoutMs: number): Promise<Result<void, ConnectError>> {
    const { endpoint } = handle;
    const client = this.createClient(buildClientOptions(endpoint, timeoutMs));

    return new Promise((resolve) => {
      let settled = false;

      const finish = (result: Result<void, ConnectError>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        client.removeListener('connect', onConnect);
        client.removeListener('error', onError);
        client.removeListener('close', onClose);

        if (result.ok) {
          this.attach(handle, client);
        } else {
          // keep an error listener so a late socket error is not rethrown
          client.on('error', () => { });
          client.end(true);
        }
        resolve(result);
      };

      const onConnect = () => finish(ok());
      const onError = (error: Error) => finish(err(classifyConnectError(error, endpoint)));
      const onClose = () => finish(err(new ConnectError(
        'unreachable',
        `Connection to ${endpoint.host}:${endpoint.port} closed before the broker acknowledged it`,
      )));
      const timer = setTimeout(() => finish(err(new ConnectError(
        'timeout',
        `No answer from ${endpoint.host}:${endpoint.port} within ${timeoutMs}ms`,
      ))), timeoutMs);

      client.on('connect', onConnect);
      client.on('error', onError);
      client.on('close', onClose);
    });
  }

  protected async close(handle: TransportHandle): Promise<void> {
    const attached = this.clients.get(handle.id);
    if (!attached) return;
    this.clients.delete(handle.id);
    attached.detach();
    try {
      await attached.client.endAsync();
    } catch (error) {
      this.logger.warn(`Error while closing connection #${handle.id}:`, error);
    }
  }

  protected write(handle: TransportHandle, topic: Topic, payload: Uint8Array): void {
    const client = this.clients.get(handle.id)?.client;
    if (!client) return;
    client.publishAsync(topic, toBuffer(payload), { qos: this.qos }).catch((error: unknown) => {
      this.logger.warn(`Publish to ${topic} failed:`, error);
    });
  }

  protected async requestSubscribe(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>> {
    const client = this.clients.get(handle.id)?.client;
    if (!client) return err(new SubscriptionError('not-connected', topic, `Cannot subscribe ${topic}: not connected`));

    const granted = await client.subscribeAsync(topic, { qos: this.qos });
    if (granted.some((grant) => grant.qos === 128)) {
      return err(new SubscriptionError('rejected', topic, `Broker rejected subscription to ${topic}`));
    }
    return ok();
  }

  protected async requestUnsubscribe(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>> {
    const client = this.clients.get(handle.id)?.client;
    if (!client) return err(new SubscriptionError('not-connected', topic, `Cannot unsubscribe ${topic}: not connected`));

    await client.unsubscribeAsync(topic);
    return ok();
  }

  private attach(handle: TransportHandle, client: MqttClientLike) {
    let lastError: Error | undefined;

    const onMessage = (topic: string, payload: Buffer, packet: PublishPacketInfo) => {
      if (packet.qos > 0 && packet.messageId !== undefined && this.isRedelivery(packet.messageId, packet.dup)) {
        this.logger.debug(`dropping redelivered message ${packet.messageId} on ${topic}`);
        return;
      }
      this.receive(handle, topic, toUint8(payload));
    };
    const onError = (error: Error) => {
      lastError = error;
      this.logger.warn(`Connection #${handle.id} error: ${error.message}`);
    };
    const onClose = () => {
      this.clients.delete(handle.id);
      detach();
      client.end(true);
      this.lost(handle, lastError);
    };
    const detach = () => {
      client.removeListener('message', onMessage);
      client.removeListener('close', onClose);
    };

    client.on('message', onMessage);
    client.on('error', onError);
    client.on('close', onClose);
    this.clients.set(handle.id, { client, detach });
  }

  private isRedelivery(messageId: number, dup: boolean): boolean {
    if (dup && this.recentIdSet.has(messageId)) return true;
    if (!this.recentIdSet.has(messageId)) {
      this.recentIdSet.add(messageId);
      const evicted = this.recentIds.push(messageId);
      if (evicted !== undefined) this.recentIdSet.delete(evicted);
    }
    return false;
  }
}
