/**
 * ssh2-backed connector: a client session to the bastion, a direct-tcpip
 * tunnel from it to the node's management address, and a second client
 * session running over that tunnel.
 */

import { Client, ClientChannel, ConnectConfig, SFTPWrapper } from 'ssh2';
import { ExecOptions, ExecResult, SshConnector, SshEndpoint, SshRoute, SshSession } from './connector';

const DEFAULT_READY_TIMEOUT_MS = 20_000;

export class Ssh2Connector implements SshConnector {
  async connect(route: SshRoute): Promise<SshSession> {
    const readyTimeout = route.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    const bastion = new Client();
    let node: Client | undefined;
    try {
      await ready(bastion, { ...endpointConfig(route.bastion), readyTimeout });
      const tunnel = await forwardOut(bastion, route.node);
      node = new Client();
      await ready(node, { ...endpointConfig(route.node), sock: tunnel, readyTimeout });
      return new Ssh2Session(bastion, node);
    } catch (err) {
      node?.end();
      bastion.end();
      throw err;
    }
  }
}

class Ssh2Session implements SshSession {
  private closed = false;
  private failure?: Error;
  private readonly inFlight = new Set<(err: Error) => void>();
  private readonly streams = new Set<ClientChannel>();

  private readonly onError = (err: Error): void => {
    this.failure ??= err;
    for (const stream of this.streams) stream.destroy();
    for (const fail of this.inFlight) fail(err);
    this.inFlight.clear();
  };

  constructor(private readonly bastion: Client, private readonly node: Client) {
    bastion.on('error', this.onError);
    node.on('error', this.onError);
  }

  exec(command: string, options: ExecOptions): Promise<ExecResult> {
    return this.guard<ExecResult>((resolve, reject) => {
      this.node.exec(command, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }
        this.streams.add(stream);
        collect(stream, options)
          .finally(() => this.streams.delete(stream))
          .then(resolve, reject);
      });
    });
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const sftp = await this.sftp();
    try {
      await this.guard<void>((resolve, reject) =>
        sftp.fastPut(localPath, remotePath, (err) => (err ? reject(err) : resolve())),
      );
    } finally {
      sftp.end();
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const sftp = await this.sftp();
    try {
      await this.guard<void>((resolve, reject) =>
        sftp.fastGet(remotePath, localPath, (err) => (err ? reject(err) : resolve())),
      );
    } finally {
      sftp.end();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.node.end();
    this.bastion.end();
    this.node.removeListener('error', this.onError);
    this.bastion.removeListener('error', this.onError);
  }

  private sftp(): Promise<SFTPWrapper> {
    return this.guard<SFTPWrapper>((resolve, reject) => {
      this.node.sftp((err, sftp) => (err ? reject(err) : resolve(sftp)));
    });
  }

  /** Runs `start`, failing early if either hop has already errored or errors before it settles. */
  private guard<T>(start: (resolve: (value: T) => void, reject: (err: Error) => void) => void): Promise<T> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.reject(new Error('SSH session is closed'));
    return new Promise<T>((resolve, reject) => {
      const fail = (err: Error): void => reject(err);
      this.inFlight.add(fail);
      start(
        (value) => {
          this.inFlight.delete(fail);
          resolve(value);
        },
        (err) => {
          this.inFlight.delete(fail);
          reject(err);
        },
      );
    });
  }
}

function endpointConfig(endpoint: SshEndpoint): ConnectConfig {
  return {
    host: endpoint.host,
    port: endpoint.port,
    username: endpoint.username,
    privateKey: endpoint.privateKey,
    passphrase: endpoint.passphrase,
  };
}

function ready(client: Client, config: ConnectConfig): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      client.removeListener('ready', onReady);
      reject(err);
    };
    const onReady = (): void => {
      client.removeListener('error', onError);
      resolve();
    };
    client.once('ready', onReady);
    client.once('error', onError);
    client.connect(config);
  });
}

function forwardOut(bastion: Client, node: SshEndpoint): Promise<ClientChannel> {
  return new Promise((resolve, reject) => {
    bastion.forwardOut('127.0.0.1', 0, node.host, node.port, (err, channel) => (err ? reject(err) : resolve(channel)));
  });
}

function collect(stream: ClientChannel, options: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let exitCode: number | null = null;
    let timedOut = false;

    const stop = (): void => {
      timedOut = true;
      stream.destroy();
    };
    const timer = setTimeout(stop, options.timeoutMs);
    options.signal?.addEventListener('abort', stop, { once: true });

    stream.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf-8');
    });
    stream.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf-8');
    });
    stream.on('exit', (code: number | null) => {
      exitCode = code;
    });
    stream.on('close', () => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', stop);
      resolve({ exitCode: timedOut ? null : exitCode, stdout, stderr, timedOut });
    });
  });
}
