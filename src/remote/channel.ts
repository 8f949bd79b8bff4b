/**
 * Remote Execution Channel.
 *
 * Runs commands and transfers files on a node's management address through
 * the bastion. Each call opens its own session and closes it on every exit
 * path. Connection failures are retried with backoff; a non-zero exit code
 * or an execution timeout is returned as data.
 */

import { readFile } from 'fs/promises';
import {
  ConnectError,
  InvalidStateError,
  NodeNotReadyError,
  maskSecretsInMessage,
} from '../domain/errors';
import { ReservationState } from '../domain/reservation';
import { BackoffPolicy, computeBackoff } from '../engine/backoff';
import { Clock, systemClock } from '../engine/clock';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { TopologyGraph } from '../topology/graph';
import { ExecResult, SshConnector, SshEndpoint, SshSession } from './connector';
import { Ssh2Connector } from './ssh2-connector';
import { runBounded } from './worker-pool';

/** What the channel needs to know about a node. */
export interface RemoteTarget {
  name: string;
  managementIp?: string;
  username?: string;
  reservationState: ReservationState;
}

export interface BastionSettings {
  host: string;
  port?: number;
  username: string;
  keyFile: string;
  passphrase?: string;
}

export interface SliceKeySettings {
  privateKeyFile: string;
  passphrase?: string;
}

export interface RemoteChannelOptions {
  bastion: BastionSettings;
  sliceKey: SliceKeySettings;
  connector?: SshConnector;
  /** Connection attempts per call. Default: 3. */
  connectAttempts?: number;
  backoff?: BackoffPolicy;
  /** Command timeout when a call gives none. Default: 300_000 (5 min). */
  defaultTimeoutMs?: number;
  readyTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** Reads key files; defaults to the filesystem. */
  readKey?: (path: string) => Promise<string | Buffer>;
}

export interface CommandOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface WaitForSshOptions {
  timeoutMs?: number;
  intervalMs?: number;
  concurrency?: number;
  signal?: AbortSignal;
}

export interface WaitForSshResult {
  ready: string[];
  unreachable: string[];
}

const DEFAULT_CONNECT_BACKOFF: BackoffPolicy = { strategy: 'exponential', baseMs: 2_000, maxMs: 30_000 };

/** Resolve a node of a graph into a channel target. */
export function targetOf(graph: TopologyGraph, nodeName: string): RemoteTarget {
  const node = graph.requireNode(nodeName);
  return {
    name: node.name,
    managementIp: node.managementIp,
    username: graph.loginUser(node.name),
    reservationState: node.reservation.state,
  };
}

export class RemoteChannel {
  private readonly connector: SshConnector;
  private readonly connectAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly defaultTimeoutMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly readKey: (path: string) => Promise<string | Buffer>;
  private keys?: Promise<{ bastion: string | Buffer; slice: string | Buffer }>;

  constructor(private readonly options: RemoteChannelOptions) {
    this.connector = options.connector ?? new Ssh2Connector();
    this.connectAttempts = options.connectAttempts ?? 3;
    this.backoff = options.backoff ?? DEFAULT_CONNECT_BACKOFF;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 300_000;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'remote' });
    this.readKey = options.readKey ?? ((path) => readFile(path));
  }

  async execute(target: RemoteTarget, command: string, options: CommandOptions = {}): Promise<ExecResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const result = await this.withSession(target, options.signal, (session) =>
      session.exec(command, { timeoutMs, signal: options.signal }),
    );
    this.log.debug('Command finished', {
      node: target.name,
      command,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });
    return result;
  }

  async upload(target: RemoteTarget, localPath: string, remotePath: string, signal?: AbortSignal): Promise<void> {
    await this.withSession(target, signal, (session) => session.upload(localPath, remotePath));
    this.log.debug('Uploaded file', { node: target.name, localPath, remotePath });
  }

  async download(target: RemoteTarget, remotePath: string, localPath: string, signal?: AbortSignal): Promise<void> {
    await this.withSession(target, signal, (session) => session.download(remotePath, localPath));
    this.log.debug('Downloaded file', { node: target.name, remotePath, localPath });
  }

  /** One connection attempt running `true`; false when the node cannot be reached. */
  async testSsh(target: RemoteTarget): Promise<boolean> {
    if (!target.managementIp) return false;
    try {
      const result = await this.withSession(target, undefined, (session) =>
        session.exec('true', { timeoutMs: 30_000 }),
        1,
      );
      return result.exitCode === 0;
    } catch (err) {
      this.log.debug('SSH test failed', { node: target.name, ...errorContext(err) });
      return false;
    }
  }

  /** Poll nodes until each accepts SSH or the budget runs out. */
  async waitForSsh(targets: readonly RemoteTarget[], options: WaitForSshOptions = {}): Promise<WaitForSshResult> {
    const timeoutMs = options.timeoutMs ?? 600_000;
    const intervalMs = options.intervalMs ?? 10_000;
    const deadline = this.clock.now() + timeoutMs;

    const settled = await runBounded(targets, options.concurrency ?? 32, async (target) => {
      for (;;) {
        if (await this.testSsh(target)) return true;
        if (options.signal?.aborted || this.clock.now() + intervalMs > deadline) return false;
        await this.clock.sleep(intervalMs, options.signal);
      }
    });

    const ready: string[] = [];
    const unreachable: string[] = [];
    settled.forEach((outcome, i) => {
      const name = targets[i].name;
      if (outcome.status === 'fulfilled' && outcome.value) ready.push(name);
      else unreachable.push(name);
    });
    return { ready, unreachable };
  }

  /** Open a session, run `fn`, close the session whatever happens. */
  private async withSession<T>(
    target: RemoteTarget,
    signal: AbortSignal | undefined,
    fn: (session: SshSession) => Promise<T>,
    attempts = this.connectAttempts,
  ): Promise<T> {
    if (!target.managementIp) {
      throw new NodeNotReadyError(target.name, target.reservationState);
    }
    if (!target.username) {
      throw new InvalidStateError(`Node "${target.name}" has no login user`, target.name);
    }

    const session = await this.connect(target, target.managementIp, target.username, attempts, signal);
    try {
      return await fn(session);
    } finally {
      session.close();
    }
  }

  private async connect(
    target: RemoteTarget,
    host: string,
    username: string,
    attempts: number,
    signal: AbortSignal | undefined,
  ): Promise<SshSession> {
    const keys = await this.loadKeys();
    const bastion: SshEndpoint = {
      host: this.options.bastion.host,
      port: this.options.bastion.port ?? 22,
      username: this.options.bastion.username,
      privateKey: keys.bastion,
      passphrase: this.options.bastion.passphrase,
    };
    const node: SshEndpoint = {
      host,
      port: 22,
      username,
      privateKey: keys.slice,
      passphrase: this.options.sliceKey.passphrase,
    };

    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.connector.connect({ bastion, node, readyTimeoutMs: this.options.readyTimeoutMs });
      } catch (err) {
        lastError = err;
        if (signal?.aborted || attempt === attempts) {
          throw new ConnectError(target.name, attempt, this.mask(err), err);
        }
        const delay = computeBackoff(this.backoff, attempt);
        this.log.warn('SSH connection failed, retrying', {
          node: target.name,
          attempt,
          delayMs: delay,
          error: this.mask(err),
        });
        await this.clock.sleep(delay, signal);
      }
    }
    throw new ConnectError(target.name, attempts, this.mask(lastError), lastError);
  }

  private loadKeys(): Promise<{ bastion: string | Buffer; slice: string | Buffer }> {
    if (!this.keys) {
      const pending = Promise.all([
        this.readKey(this.options.bastion.keyFile),
        this.readKey(this.options.sliceKey.privateKeyFile),
      ]).then(([bastion, slice]) => ({ bastion, slice }));
      // A failed read is retried on the next call.
      pending.catch(() => {
        this.keys = undefined;
      });
      this.keys = pending;
    }
    return this.keys;
  }

  private mask(err: unknown): string {
    const message = err instanceof Error ? err.message : String(err);
    return maskSecretsInMessage(message, [this.options.bastion.passphrase, this.options.sliceKey.passphrase]);
  }
}
