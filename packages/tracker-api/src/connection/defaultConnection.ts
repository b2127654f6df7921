/**
 * Default Connection Accessor
 *
 * Replaceable holder of one Connection built from environment variables.
 * Only the convenience wrappers in `api.ts` use it; EntityHub and
 * OperationsSession always receive their connection explicitly.
 */

import type { LogChannel } from '../telemetry';
import { loadConnectionConfig, EnvironmentSource } from './config';
import { Connection, ConnectionOptions, ServerConnection } from './connection';

export interface DefaultConnectionAccessorOptions {
  /** Read on every construction, so a reset picks up changed variables */
  env?: () => EnvironmentSource;
  /** Construct the connection from resolved options */
  factory?: (options: ConnectionOptions) => Connection;
  log?: LogChannel;
}

export class DefaultConnectionAccessor {
  private connection: ServerConnection | null = null;
  private pending: Promise<ServerConnection> | null = null;
  private generation = 0;

  private readonly readEnv: () => EnvironmentSource;
  private readonly factory: (options: ConnectionOptions) => Connection;
  private readonly log: LogChannel | undefined;

  constructor(options: DefaultConnectionAccessorOptions = {}) {
    this.readEnv = options.env ?? (() => process.env);
    this.factory = options.factory ?? (connectionOptions => new Connection(connectionOptions));
    this.log = options.log;
  }

  /**
   * Installed connection, or one built from the environment and connected.
   * Concurrent first calls share one construction.
   */
  async getDefault(): Promise<ServerConnection> {
    if (this.connection !== null) {
      return this.connection;
    }
    if (this.pending === null) {
      const generation = this.generation;
      this.pending = this.construct(generation).finally(() => {
        if (generation === this.generation) {
          this.pending = null;
        }
      });
    }
    return this.pending;
  }

  setDefault(connection: ServerConnection): void {
    this.generation += 1;
    this.pending = null;
    this.connection = connection;
  }

  /**
   * Forget the current connection; the next getDefault() reads the
   * environment again.
   */
  resetDefault(): void {
    this.generation += 1;
    this.pending = null;
    this.connection = null;
  }

  isDefaultSet(): boolean {
    return this.connection !== null;
  }

  private async construct(generation: number): Promise<ServerConnection> {
    const options = loadConnectionConfig(this.readEnv());
    const connection = this.factory(this.log ? { ...options, log: this.log } : options);
    await connection.connect();
    // A set or reset during construction wins over this result
    if (generation === this.generation) {
      this.connection = connection;
    }
    return connection;
  }
}

const defaultAccessor = new DefaultConnectionAccessor();

export function getDefault(): Promise<ServerConnection> {
  return defaultAccessor.getDefault();
}

export function setDefault(connection: ServerConnection): void {
  defaultAccessor.setDefault(connection);
}

export function resetDefault(): void {
  defaultAccessor.resetDefault();
}

export function isDefaultSet(): boolean {
  return defaultAccessor.isDefaultSet();
}
