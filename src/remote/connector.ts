/**
 * SSH transport seam.
 *
 * A connector opens one session to a node through the bastion. The channel
 * owns retry, timeouts and session lifetime; connectors only move bytes.
 */

export interface SshEndpoint {
  host: string;
  port: number;
  username: string;
  privateKey: string | Buffer;
  passphrase?: string;
}

export interface SshRoute {
  bastion: SshEndpoint;
  /** The node, reached through a tunnel opened on the bastion. */
  node: SshEndpoint;
  /** Handshake timeout per hop. */
  readyTimeoutMs?: number;
}

export interface ExecResult {
  /** Null when the command was killed or timed out. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ExecOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SshSession {
  exec(command: string, options: ExecOptions): Promise<ExecResult>;
  upload(localPath: string, remotePath: string): Promise<void>;
  download(remotePath: string, localPath: string): Promise<void>;
  /** Close both hops. Safe to call more than once. */
  close(): void;
}

export interface SshConnector {
  /** Open both hops; rejects if either fails, leaving nothing open. */
  connect(route: SshRoute): Promise<SshSession>;
}
