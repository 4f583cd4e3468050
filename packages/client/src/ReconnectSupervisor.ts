import type {
  BrokerEndpoint,
  ConnectionState,
  Result,
  SubscriptionRegistry,
  Topic,
  Transport,
  TransportHandle,
} from '@tagstream/core';
import type {
  ReconnectSupervisorEvents,
  ReconnectSupervisorOptions,
  StateChange,
  SubscriptionOutcome,
} from './types.js';

import { setTimeout as sleep } from 'node:timers/promises';
import { type queueAsPromised, promise as fastqPromise } from 'fastq';
import {
  ConnectError,
  SubscriptionError,
  TypedEventEmitter,
  createLogger,
  err,
  ok,
} from '@tagstream/core';
import { BackoffPolicy } from './backoff.js';

interface ReplayTask {
  handle: TransportHandle;
  topic: Topic;
  action: 'subscribe' | 'unsubscribe';
}

// Upper bound on reconcile rounds while the registry keeps changing under a replay.
const MAX_RECONCILE_PASSES = 8;

/**
 * Drives the connection state machine and keeps broker-side subscriptions in
 * line with the {@link SubscriptionRegistry}.
 *
 * ```text
 * disconnected --start--> connecting --ok--> connected
 *                            ^   |                |
 *                      timer |   | failure        | transport lost
 *                            |   v                |
 *                           backoff <-------------+
 * any --stop--> disconnecting --> disconnected (terminal)
 * ```
 *
 * On every successful connect the active topics are replayed before the
 * state becomes `connected`. Each topic is retried on its own; one that keeps
 * failing is reported through `degraded` and does not hold up the others.
 */
export class ReconnectSupervisor extends TypedEventEmitter<ReconnectSupervisorEvents> {
  private currentState: ConnectionState = 'disconnected';
  private handle?: TransportHandle;
  /** Topics the broker holds for `handle`. */
  private brokerTopics = new Set<Topic>();
  private backoffTimer?: NodeJS.Timeout;
  private inflight?: Promise<void>;
  private stopped = false;
  /** Tail of the pending sync for each topic; raw calls for one topic never overlap. */
  private readonly topicSyncs = new Map<Topic, Promise<void>>();

  private readonly endpoint: BrokerEndpoint;
  private readonly connectTimeoutMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly replayAttempts: number;
  private readonly replayRetryDelayMs: number;
  private readonly replayQueue: queueAsPromised<ReplayTask, void>;

  constructor(
    private readonly transport: Transport,
    private readonly registry: SubscriptionRegistry,
    options: ReconnectSupervisorOptions,
  ) {
    super(options.logger ?? createLogger('ReconnectSupervisor'));
    this.endpoint = options.endpoint;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.backoff = new BackoffPolicy(options.backoff);
    this.replayAttempts = Math.max(1, options.replayAttempts ?? 3);
    this.replayRetryDelayMs = options.replayRetryDelayMs ?? 250;
    this.replayQueue = fastqPromise(this, this.runReplayTask.bind(this), Math.max(1, options.replayConcurrency ?? 4));

    this.transport.onDisconnect((lost, cause) => this.handleTransportLoss(lost, cause));
  }

  public get state(): ConnectionState {
    return this.currentState;
  }

  /** The live connection, only while `connected`. */
  public get currentHandle(): TransportHandle | undefined {
    return this.currentState === 'connected' ? this.handle : undefined;
  }

  /** Topics the broker currently holds for this session. */
  public get subscribedTopics(): ReadonlySet<Topic> {
    return new Set(this.brokerTopics);
  }

  /**
   * Begins connecting. Ignored unless `disconnected`, and always after {@link stop}.
   */
  public start(): void {
    if (this.stopped) {
      this.logger.warn('start() after stop() ignored');
      return;
    }
    if (this.currentState !== 'disconnected') return;
    this.runAttempt();
  }

  /**
   * Stops for good: cancels a pending retry, waits out a connection attempt
   * in progress and closes the connection. No automatic transition happens
   * afterwards.
   */
  public async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = undefined;
    }

    const handle = this.handle;
    const inflight = this.inflight;
    this.handle = undefined;
    this.brokerTopics = new Set();

    if (handle || inflight) this.transition('disconnecting');
    if (handle) await this.transport.disconnect(handle);
    // an attempt that connects after this point closes its own connection
    if (inflight) await inflight;
    this.transition('disconnected');
  }

  /**
   * Brings the broker in line with the registry for `topic` after it was
   * marked active. Resolves `deferred` when there is no live connection; the
   * next replay picks it up.
   */
  public applySubscribe(topic: Topic): Promise<Result<SubscriptionOutcome, SubscriptionError>> {
    return this.serialize(topic, () => this.syncTopic(topic));
  }

  /**
   * Brings the broker in line with the registry for `topic` after it was
   * marked inactive. Resolves `deferred` when there is no live connection;
   * broker subscriptions do not outlive a connection.
   */
  public applyUnsubscribe(topic: Topic): Promise<Result<SubscriptionOutcome, SubscriptionError>> {
    return this.serialize(topic, () => this.syncTopic(topic));
  }

  /**
   * Runs `task` once every earlier task for `topic` has settled. The task
   * always starts on a later tick, so a call made from inside a raw request
   * queues behind it.
   */
  private serialize<T>(topic: Topic, task: () => Promise<T>): Promise<T> {
    const previous = this.topicSyncs.get(topic) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(() => undefined, () => undefined);
    this.topicSyncs.set(topic, tail);
    return result.finally(() => {
      if (this.topicSyncs.get(topic) === tail) this.topicSyncs.delete(topic);
    });
  }

  /**
   * Issues raw calls until the broker matches the registry for `topic`.
   * The registry is read again after every call, so a change made while a
   * call was in flight is applied before this resolves.
   */
  private async syncTopic(topic: Topic): Promise<Result<SubscriptionOutcome, SubscriptionError>> {
    for (;;) {
      const handle = this.currentHandle;
      if (!handle) return ok('deferred');

      const wanted = this.registry.isActive(topic);
      if (wanted === this.brokerTopics.has(topic)) return ok('applied');

      const result = wanted
        ? await this.transport.subscribeRaw(handle, topic)
        : await this.transport.unsubscribeRaw(handle, topic);
      if (!result.ok) {
        return result.error.reason === 'not-connected' ? ok('deferred') : result;
      }
      if (this.handle !== handle) return ok('deferred');

      if (wanted) this.brokerTopics.add(topic);
      else this.brokerTopics.delete(topic);
    }
  }

  private runAttempt() {
    const running: Promise<void> = this.attempt()
      .catch((error: unknown) => {
        this.logger.error('Connection attempt crashed:', error);
        this.enterBackoff();
      })
      .finally(() => {
        if (this.inflight === running) this.inflight = undefined;
      });
    this.inflight = running;
  }

  private async attempt(): Promise<void> {
    this.transition('connecting');

    let result: Result<TransportHandle, ConnectError>;
    try {
      result = await this.transport.connect(this.endpoint, this.connectTimeoutMs);
    } catch (error) {
      result = err(new ConnectError(
        'unreachable',
        `Could not connect to ${this.endpoint.host}:${this.endpoint.port}`,
        { cause: error },
      ));
    }

    if (this.stopped) {
      if (result.ok) await this.transport.disconnect(result.value);
      return;
    }

    if (!result.ok) {
      this.logger.warn(`Connect failed (${result.error.reason}): ${result.error.message}`);
      this.emit('connectError', result.error);
      this.enterBackoff(result.error);
      return;
    }

    const handle = result.value;
    this.handle = handle;
    this.brokerTopics = new Set();
    this.logger.debug(`connected #${handle.id}, replaying subscriptions`);

    await this.reconcile(handle);

    // lost or stopped while replaying; whoever noticed has already moved on
    if (this.stopped || this.handle !== handle) return;

    this.backoff.reset();
    this.transition('connected');
    this.logger.info(`Connected to ${this.endpoint.host}:${this.endpoint.port}`);
  }

  /**
   * Brings the broker's subscriptions for `handle` in line with the registry.
   * Repeats while the registry changes underneath, so topics added or removed
   * during the replay are not missed. A topic is not sent the same action
   * twice in a row within one connection, so a call that keeps failing is
   * given up on (and reported `degraded`) once.
   */
  private async reconcile(handle: TransportHandle): Promise<void> {
    const lastAction = new Map<Topic, ReplayTask['action']>();

    for (let pass = 0; pass < MAX_RECONCILE_PASSES; pass++) {
      if (this.stopped || this.handle !== handle) return;

      const desired = this.registry.activeTopics();
      const tasks: ReplayTask[] = [];
      for (const topic of desired) {
        if (!this.brokerTopics.has(topic) && lastAction.get(topic) !== 'subscribe') {
          tasks.push({ handle, topic, action: 'subscribe' });
        }
      }
      for (const topic of this.brokerTopics) {
        if (!desired.has(topic) && lastAction.get(topic) !== 'unsubscribe') {
          tasks.push({ handle, topic, action: 'unsubscribe' });
        }
      }
      if (tasks.length === 0) return;

      for (const task of tasks) lastAction.set(task.topic, task.action);
      await Promise.all(tasks.map((task) => this.replayQueue.push(task)));
    }

    this.logger.warn(`Subscriptions still changing after ${MAX_RECONCILE_PASSES} replay passes`);
  }

  private async runReplayTask(task: ReplayTask): Promise<void> {
    const { handle, topic, action } = task;
    let lastError: SubscriptionError | undefined;

    for (let attempt = 1; attempt <= this.replayAttempts; attempt++) {
      if (this.stopped || this.handle !== handle) return;

      const result = action === 'subscribe'
        ? await this.transport.subscribeRaw(handle, topic)
        : await this.transport.unsubscribeRaw(handle, topic);

      if (result.ok) {
        if (this.handle === handle) {
          if (action === 'subscribe') this.brokerTopics.add(topic);
          else this.brokerTopics.delete(topic);
        }
        return;
      }
      if (result.error.reason === 'not-connected') return;

      lastError = result.error;
      this.logger.debug(`${action} ${topic} failed (attempt ${attempt}/${this.replayAttempts}): ${lastError.message}`);
      if (attempt < this.replayAttempts) await sleep(this.replayRetryDelayMs);
    }

    if (lastError) {
      this.logger.warn(`Could not ${action} ${topic} after ${this.replayAttempts} attempts; continuing degraded`);
      this.emit('degraded', topic, lastError);
    }
  }

  private handleTransportLoss(lost: TransportHandle, cause?: Error) {
    if (!this.handle || this.handle.id !== lost.id) return;
    this.handle = undefined;
    this.brokerTopics = new Set();
    if (this.stopped) return;

    this.logger.warn(`Disconnected${cause ? `: ${cause.message}` : ''}`);
    this.enterBackoff();
  }

  private enterBackoff(error?: ConnectError) {
    if (this.stopped || this.backoffTimer) return;

    const delayMs = this.backoff.next();
    this.logger.debug(`reconnecting in ${delayMs}ms`);
    this.transition('backoff', { delayMs, error });

    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = undefined;
      this.runAttempt();
    }, delayMs);
  }

  private transition(to: ConnectionState, detail: Pick<StateChange, 'delayMs' | 'error'> = {}) {
    const from = this.currentState;
    if (from === to) return;
    this.currentState = to;

    const change: StateChange = { from, to };
    if (detail.delayMs !== undefined) change.delayMs = detail.delayMs;
    if (detail.error) change.error = detail.error;
    this.emit('state', change);
  }
}
