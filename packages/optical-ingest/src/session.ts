import { Client, type ClientChannel } from 'ssh2';
import { ConnectionError, TransportError, describeError } from './errors';

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface RemoteSession {
  execute(command: string): Promise<CommandOutput>;
  close(): Promise<void>;
}

export type SessionConnector = () => Promise<RemoteSession>;

export interface SshCredentials {
  host: string;
  port?: number;
  username: string;
  password: string;
  timeoutMs: number;
}

export interface SshSessionOptions {
  clientFactory?: () => Client;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
}

export class SshRemoteSession implements RemoteSession {
  private readonly client: Client;
  private closed = false;
  private disconnected = false;
  private lastError: Error | null = null;

  constructor(client: Client) {
    this.client = client;
    // Reported on the next execute.
    this.client.on('error', (error: Error) => {
      this.lastError = error;
    });
    this.client.on('close', () => {
      this.disconnected = true;
    });
  }

  execute(command: string): Promise<CommandOutput> {
    if (this.closed) {
      return Promise.reject(new TransportError(command, 'SSH session is closed'));
    }
    if (this.disconnected) {
      const reason = this.lastError ? `: ${this.lastError.message}` : '';
      return Promise.reject(
        new TransportError(command, `SSH connection was lost${reason}`, { cause: this.lastError ?? undefined })
      );
    }

    return new Promise<CommandOutput>((resolve, reject) => {
      const handleChannel = (error: Error | undefined, channel: ClientChannel) => {
        if (error) {
          reject(new TransportError(command, `Failed to execute remote command: ${error.message}`, { cause: error }));
          return;
        }
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode: number | null = null;
        let failed = false;

        channel.on('data', (chunk: Buffer | string) => {
          stdout.push(toBuffer(chunk));
        });
        channel.stderr.on('data', (chunk: Buffer | string) => {
          stderr.push(toBuffer(chunk));
        });
        channel.on('exit', (code: number | null) => {
          exitCode = code;
        });
        channel.on('error', (channelError: Error) => {
          failed = true;
          reject(new TransportError(command, `Remote command failed: ${channelError.message}`, { cause: channelError }));
        });
        channel.on('close', () => {
          if (failed) {
            return;
          }
          resolve({
            stdout: Buffer.concat(stdout).toString('utf8'),
            stderr: Buffer.concat(stderr).toString('utf8'),
            exitCode
          });
        });
      };

      try {
        this.client.exec(command, handleChannel);
      } catch (error) {
        reject(new TransportError(command, `Failed to execute remote command: ${describeError(error)}`, { cause: error }));
      }
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.client.end();
  }
}

export function connectSshSession(credentials: SshCredentials, options: SshSessionOptions = {}): Promise<RemoteSession> {
  const client = options.clientFactory ? options.clientFactory() : new Client();
  const target = `${credentials.username}@${credentials.host}`;

  return new Promise<RemoteSession>((resolve, reject) => {
    let settled = false;
    const onReady = () => {
      if (settled) {
        return;
      }
      settled = true;
      client.off('ready', onReady);
      const session = new SshRemoteSession(client);
      client.off('error', onError);
      resolve(session);
    };
    // Stays registered until the client has closed: teardown may emit further errors.
    const onError = (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      client.off('ready', onReady);
      client.once('close', () => {
        client.off('error', onError);
      });
      client.end();
      reject(new ConnectionError(credentials.host, `Connection to ${target} failed: ${error.message}`, { cause: error }));
    };

    client.on('ready', onReady);
    client.on('error', onError);

    try {
      client.connect({
        host: credentials.host,
        port: credentials.port,
        username: credentials.username,
        password: credentials.password,
        readyTimeout: credentials.timeoutMs
      });
    } catch (error) {
      onError(error instanceof Error ? error : new Error(String(error)));
    }
  });
}

/**
 * Opens a session, hands it to `work`, and closes it exactly once whether
 * `work` resolves, returns early or throws.
 */
export async function withRemoteSession<T>(
  connector: SessionConnector,
  work: (session: RemoteSession) => Promise<T>
): Promise<T> {
  const session = await connector();
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}
