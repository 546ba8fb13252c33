/**
 * In-process Redis Streams stand-in.
 *
 * Implements the StreamConnection contract from @tracechain/core for the
 * commands the broker uses: XADD, XGROUP CREATE, XREADGROUP (with BLOCK)
 * and XACK. All connections opened through `factory` share one store, so a
 * publisher connection wakes consumers blocked on other connections.
 *
 * @example
 * ```typescript
 * const redis = new RedisStreamsMock();
 * const broker = new RedisStreamsBroker(redis.factory, { blockMs: 50 });
 * ```
 */

import type { StreamConnection, StreamConnectionFactory } from '@tracechain/core';

export interface StoredEntry {
  id: string;
  fields: Record<string, string>;
}

export interface RecordedCommand {
  purpose: string;
  command: string;
  args: Array<string | number>;
}

interface GroupState {
  /** Index into the stream of the next entry to deliver */
  nextIndex: number;
  pending: Set<string>;
}

interface BlockedRead {
  connection: MockStreamConnection;
  tryDeliver: () => boolean;
  finish: (reply: unknown) => void;
}

type StreamReply = Array<[string, Array<[string, string[]]>]>;

export class RedisStreamsMock {
  private readonly streams = new Map<string, StoredEntry[]>();
  private readonly groups = new Map<string, Map<string, GroupState>>();
  private readonly blocked = new Set<BlockedRead>();
  private readonly failures = new Map<string, { error: Error; once: boolean; purpose?: string }>();
  private readonly connections: MockStreamConnection[] = [];
  private sequence = 0;

  readonly commands: RecordedCommand[] = [];

  /** Connection factory for RedisStreamsBroker */
  readonly factory: StreamConnectionFactory = (purpose: string) => this.connect(purpose);

  connect(purpose = 'default'): MockStreamConnection {
    const connection = new MockStreamConnection(this, purpose);
    this.connections.push(connection);
    return connection;
  }

  // ===========================================================================
  // Failure Injection
  // ===========================================================================

  /**
   * Fail the next call of `command` only. With `purpose`, only a call made
   * on a connection opened for that purpose fails.
   */
  failNext(command: string, error: Error = new Error(`${command} failed`), purpose?: string): void {
    this.failures.set(command.toUpperCase(), { error, once: true, purpose });
  }

  /** Fail every call of `command` until clearFailures(). */
  failAlways(command: string, error: Error = new Error(`${command} failed`)): void {
    this.failures.set(command.toUpperCase(), { error, once: false });
  }

  clearFailures(): void {
    this.failures.clear();
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  getEntries(stream: string): StoredEntry[] {
    return [...(this.streams.get(stream) ?? [])];
  }

  getGroupNames(stream: string): string[] {
    return [...(this.groups.get(stream)?.keys() ?? [])];
  }

  /** Ids delivered to the group and not acknowledged yet */
  getPending(stream: string, group: string): string[] {
    return [...(this.groups.get(stream)?.get(group)?.pending ?? [])];
  }

  get openConnectionCount(): number {
    return this.connections.filter(connection => !connection.isClosed).length;
  }

  get blockedReadCount(): number {
    return this.blocked.size;
  }

  commandsNamed(command: string): RecordedCommand[] {
    return this.commands.filter(recorded => recorded.command === command.toUpperCase());
  }

  // ===========================================================================
  // Command Dispatch
  // ===========================================================================

  /** @internal called by MockStreamConnection */
  execute(connection: MockStreamConnection, command: string, args: Array<string | number>): Promise<unknown> {
    const name = command.toUpperCase();
    this.commands.push({ purpose: connection.purpose, command: name, args: [...args] });

    const failure = this.failures.get(name);
    if (failure && (failure.purpose === undefined || failure.purpose === connection.purpose)) {
      if (failure.once) this.failures.delete(name);
      return Promise.reject(failure.error);
    }

    const strings = args.map(String);
    try {
      switch (name) {
        case 'XADD':
          return Promise.resolve(this.xadd(strings));
        case 'XGROUP':
          return Promise.resolve(this.xgroup(strings));
        case 'XREADGROUP':
          return this.xreadgroup(connection, strings);
        case 'XACK':
          return Promise.resolve(this.xack(strings));
        default:
          throw new Error(`ERR unknown command '${command}'`);
      }
    } catch (error) {
      return Promise.reject(error);
    }
  }

  /** @internal resolves the connection's blocked reads with a nil reply */
  releaseConnection(connection: MockStreamConnection): void {
    for (const read of [...this.blocked]) {
      if (read.connection === connection) {
        read.finish(null);
      }
    }
  }

  private xadd(args: string[]): string {
    const [stream, requestedId, ...fieldValues] = args;
    if (!stream || requestedId === undefined || fieldValues.length === 0 || fieldValues.length % 2 !== 0) {
      throw new Error("ERR wrong number of arguments for 'xadd' command");
    }

    this.sequence++;
    const id = requestedId === '*' ? `${Date.now()}-${this.sequence}` : requestedId;

    const fields: Record<string, string> = {};
    for (let i = 0; i < fieldValues.length; i += 2) {
      fields[fieldValues[i]] = fieldValues[i + 1];
    }

    const entries = this.streams.get(stream) ?? [];
    entries.push({ id, fields });
    this.streams.set(stream, entries);

    for (const read of [...this.blocked]) {
      read.tryDeliver();
    }
    return id;
  }

  private xgroup(args: string[]): string {
    const [subcommand, stream, group, startId, ...options] = args;
    if (subcommand?.toUpperCase() !== 'CREATE' || !stream || !group || startId === undefined) {
      throw new Error('ERR unsupported XGROUP form');
    }

    if (!this.streams.has(stream)) {
      if (!options.some(option => option.toUpperCase() === 'MKSTREAM')) {
        throw new Error(
          'ERR The XGROUP subcommand requires the key to exist. Note that for CREATE you may want to use the MKSTREAM option to create an empty stream automatically.'
        );
      }
      this.streams.set(stream, []);
    }

    const groups = this.groups.get(stream) ?? new Map<string, GroupState>();
    if (groups.has(group)) {
      throw new Error('BUSYGROUP Consumer Group name already exists');
    }

    const length = this.streams.get(stream)?.length ?? 0;
    groups.set(group, { nextIndex: startId === '$' ? length : 0, pending: new Set() });
    this.groups.set(stream, groups);
    return 'OK';
  }

  private xreadgroup(connection: MockStreamConnection, args: string[]): Promise<unknown> {
    const options = parseReadGroupArgs(args);
    const group = this.groups.get(options.stream)?.get(options.group);
    if (!group) {
      throw new Error(
        `NOGROUP No such key '${options.stream}' or consumer group '${options.group}' in XREADGROUP with GROUP option`
      );
    }

    const immediate = this.deliver(options.stream, group, options.count);
    if (immediate || options.blockMs === undefined) {
      return Promise.resolve(immediate);
    }

    return new Promise<unknown>(resolve => {
      let timer: NodeJS.Timeout | undefined;

      const read: BlockedRead = {
        connection,
        tryDeliver: () => {
          const reply = this.deliver(options.stream, group, options.count);
          if (reply) {
            read.finish(reply);
            return true;
          }
          return false;
        },
        finish: (reply: unknown) => {
          if (!this.blocked.delete(read)) return;
          if (timer) clearTimeout(timer);
          resolve(reply);
        },
      };

      this.blocked.add(read);
      if (options.blockMs !== undefined && options.blockMs > 0) {
        timer = setTimeout(() => read.finish(null), options.blockMs);
      }
    });
  }

  private deliver(stream: string, group: GroupState, count: number | undefined): StreamReply | null {
    const entries = this.streams.get(stream) ?? [];
    if (group.nextIndex >= entries.length) {
      return null;
    }

    const end = count ? Math.min(entries.length, group.nextIndex + count) : entries.length;
    const batch = entries.slice(group.nextIndex, end);
    group.nextIndex = end;
    for (const entry of batch) {
      group.pending.add(entry.id);
    }

    return [[stream, batch.map((entry): [string, string[]] => [entry.id, Object.entries(entry.fields).flat()])]];
  }

  private xack(args: string[]): number {
    const [stream, groupName, ...ids] = args;
    const group = this.groups.get(stream)?.get(groupName);
    if (!group) return 0;

    let acknowledged = 0;
    for (const id of ids) {
      if (group.pending.delete(id)) acknowledged++;
    }
    return acknowledged;
  }
}

export class MockStreamConnection implements StreamConnection {
  private closed = false;

  constructor(
    private readonly store: RedisStreamsMock,
    readonly purpose: string
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  send(command: string, args: Array<string | number>): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new Error('Connection is closed.'));
    }
    return this.store.execute(this, command, args);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.store.releaseConnection(this);
  }
}

function parseReadGroupArgs(args: string[]): {
  group: string;
  consumer: string;
  stream: string;
  count?: number;
  blockMs?: number;
} {
  let group: string | undefined;
  let consumer: string | undefined;
  let stream: string | undefined;
  let count: number | undefined;
  let blockMs: number | undefined;

  for (let i = 0; i < args.length; i++) {
    switch (args[i].toUpperCase()) {
      case 'GROUP':
        group = args[i + 1];
        consumer = args[i + 2];
        i += 2;
        break;
      case 'COUNT':
        count = Number(args[++i]);
        break;
      case 'BLOCK':
        blockMs = Number(args[++i]);
        break;
      case 'STREAMS':
        stream = args[i + 1];
        i = args.length;
        break;
    }
  }

  if (!group || !consumer || !stream) {
    throw new Error("ERR wrong number of arguments for 'xreadgroup' command");
  }
  return { group, consumer, stream, count, blockMs };
}
