import type { BrokerEndpoint } from '../config/index.js';
import type { InboundMessage, Result, Topic } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type {
  DisconnectCallback,
  MessageCallback,
  Transport,
  TransportHandle,
} from './Transport.js';

import { ConnectError, SendError, SubscriptionError } from '../errors/index.js';
import { err } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

/** Largest payload an MQTT PUBLISH packet can carry. */
export const MQTT_MAX_PAYLOAD_BYTES = 268_435_455;

export interface BaseTransportOptions {
  /** @default 268435455 */
  maxPayloadBytes?: number;
  logger?: Logger;
}

/**
 * Shared bookkeeping for {@link Transport} implementations.
 *
 * Tracks which handle is current, rejects operations on stale handles,
 * stamps inbound messages with a sequence number and receipt time, and
 * shields the I/O path from listener exceptions. Subclasses implement the
 * protected primitives against a concrete client.
 */
export abstract class BaseTransport implements Transport {
  protected readonly logger: Logger;
  protected readonly maxPayloadBytes: number;

  private readonly messageCallbacks: MessageCallback[] = [];
  private readonly disconnectCallbacks: DisconnectCallback[] = [];
  private current?: TransportHandle;
  private nextHandleId = 1;
  private sequence = 0;

  constructor(options: BaseTransportOptions = {}) {
    this.logger = options.logger ?? createLogger(new.target.name);
    this.maxPayloadBytes = options.maxPayloadBytes ?? MQTT_MAX_PAYLOAD_BYTES;
  }

  /** Opens the physical connection for `handle`. */
  protected abstract open(handle: TransportHandle, timeoutMs: number): Promise<Result<void, ConnectError>>;

  /** Closes the physical connection for `handle`. */
  protected abstract close(handle: TransportHandle): Promise<void>;

  protected abstract write(handle: TransportHandle, topic: Topic, payload: Uint8Array): void;

  protected abstract requestSubscribe(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>>;

  protected abstract requestUnsubscribe(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>>;

  public get isConnected(): boolean {
    return this.current !== undefined;
  }

  public isCurrent(handle: TransportHandle): boolean {
    return this.current !== undefined && this.current.id === handle.id;
  }

  public async connect(endpoint: BrokerEndpoint, timeoutMs: number): Promise<Result<TransportHandle, ConnectError>> {
    if (this.current) await this.disconnect(this.current);

    const handle: TransportHandle = Object.freeze({ id: this.nextHandleId++, endpoint });
    this.logger.debug(`connecting #${handle.id} to ${endpoint.host}:${endpoint.port}`);

    const opened = await this.open(handle, timeoutMs);
    if (!opened.ok) return opened;

    this.current = handle;
    return { ok: true, value: handle };
  }

  public async disconnect(handle: TransportHandle): Promise<void> {
    if (!this.isCurrent(handle)) return;
    this.current = undefined;
    await this.close(handle);
  }

  public send(handle: TransportHandle, topic: Topic, payload: Uint8Array): Result<void, SendError> {
    if (!this.isCurrent(handle)) {
      return err(new SendError('not-connected', `Cannot publish to ${topic}: not connected`));
    }
    if (payload.byteLength > this.maxPayloadBytes) {
      return err(new SendError(
        'payload-too-large',
        `Payload of ${payload.byteLength} bytes exceeds the ${this.maxPayloadBytes} byte limit`,
      ));
    }
    this.write(handle, topic, payload);
    return { ok: true, value: undefined };
  }

  public subscribeRaw(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>> {
    return this.guardSubscription(handle, topic, 'subscribe', () => this.requestSubscribe(handle, topic));
  }

  public unsubscribeRaw(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>> {
    return this.guardSubscription(handle, topic, 'unsubscribe', () => this.requestUnsubscribe(handle, topic));
  }

  public onMessage(callback: MessageCallback): void {
    this.messageCallbacks.push(callback);
  }

  public onDisconnect(callback: DisconnectCallback): void {
    this.disconnectCallbacks.push(callback);
  }

  /**
   * Called by subclasses for every message read off `handle`.
   * Messages from a stale connection are discarded.
   */
  protected receive(handle: TransportHandle, topic: Topic, payload: Uint8Array): void {
    if (!this.isCurrent(handle)) return;

    const message: InboundMessage = Object.freeze({
      topic,
      payload,
      receivedAt: Date.now(),
      sequence: ++this.sequence,
    });
    for (const callback of this.messageCallbacks) {
      try {
        callback(message);
      } catch (error) {
        this.logger.error(`Message callback failed for ${topic}:`, error);
      }
    }
  }

  /**
   * Called by subclasses when `handle` drops on its own.
   * Ignored for stale handles, including ones closed through {@link disconnect}.
   */
  protected lost(handle: TransportHandle, cause?: Error): void {
    if (!this.isCurrent(handle)) return;
    this.current = undefined;
    this.logger.warn(`Connection #${handle.id} lost${cause ? `: ${cause.message}` : ''}`);

    for (const callback of this.disconnectCallbacks) {
      try {
        callback(handle, cause);
      } catch (error) {
        this.logger.error('Disconnect callback failed:', error);
      }
    }
  }

  private async guardSubscription(
    handle: TransportHandle,
    topic: Topic,
    action: 'subscribe' | 'unsubscribe',
    request: () => Promise<Result<void, SubscriptionError>>,
  ): Promise<Result<void, SubscriptionError>> {
    if (!this.isCurrent(handle)) {
      return err(new SubscriptionError('not-connected', topic, `Cannot ${action} ${topic}: not connected`));
    }
    try {
      return await request();
    } catch (error) {
      return err(new SubscriptionError('transport', topic, `Failed to ${action} ${topic}`, { cause: error }));
    }
  }
}
