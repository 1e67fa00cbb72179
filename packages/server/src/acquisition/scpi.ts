import { Socket } from 'net';
import { EventEmitter } from 'events';
import { TransportError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

/**
 * Minimal SCPI session: newline-terminated commands, newline-terminated text
 * replies, and IEEE 488.2 definite-length binary blocks.
 */
export interface ScpiTransport {
  write(command: string): Promise<void>;
  query(command: string): Promise<string>;
  queryBinary(command: string): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface BinaryBlock {
  payload: Uint8Array;
  /** Bytes consumed including header and the optional trailing newline. */
  consumed: number;
}

/**
 * Parse `#<n><len digits><payload>[\n]` from the front of `buf`.
 * Returns null while the block is still incomplete.
 */
export function parseBinaryBlock(buf: Uint8Array): BinaryBlock | null {
  if (buf.length < 2) return null;
  if (buf[0] !== 0x23 /* '#' */) {
    throw new TransportError(`Binary block must start with '#', got 0x${buf[0].toString(16)}`);
  }
  const digits = buf[1] - 0x30;
  if (digits < 1 || digits > 9) {
    // '#0' (indefinite length) is not produced by the supported instruments
    throw new TransportError(`Unsupported binary block header '#${String.fromCharCode(buf[1])}'`);
  }
  if (buf.length < 2 + digits) return null;

  const lengthText = Buffer.from(buf.subarray(2, 2 + digits)).toString('ascii');
  if (!/^\d+$/.test(lengthText)) {
    throw new TransportError(`Malformed binary block length '${lengthText}'`);
  }
  const length = parseInt(lengthText, 10);
  const start = 2 + digits;
  if (buf.length < start + length) return null;

  let consumed = start + length;
  if (buf.length > consumed && buf[consumed] === 0x0a) consumed++;
  return { payload: buf.slice(start, start + length), consumed };
}

type Pending =
  | { kind: 'text'; resolve: (reply: string) => void; reject: (err: Error) => void }
  | { kind: 'binary'; resolve: (reply: Uint8Array) => void; reject: (err: Error) => void };

export interface ScpiTcpOptions {
  connectTimeoutMs?: number;
  ioTimeoutMs?: number;
  logger?: Logger;
}

/**
 * SCPI over a raw TCP socket (LXI "socket" port, 5555 on most bench scopes).
 *
 * One request is in flight at a time; callers are serialized through a
 * promise chain so replies always pair with the query that produced them.
 * A request that times out or receives a malformed reply drops the session:
 * its late reply would otherwise answer the next query. Call connect() again
 * to open a fresh one.
 */
export class ScpiTcpClient extends EventEmitter implements ScpiTransport {
  private socket: Socket | null = null;
  private connected = false;
  private receiveBuffer: Buffer = Buffer.alloc(0);
  private pending: Pending | null = null;
  private chain: Promise<unknown> = Promise.resolve();
  private readonly connectTimeoutMs: number;
  private readonly ioTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly host: string, private readonly port: number, options: ScpiTcpOptions = {}) {
    super();
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.ioTimeoutMs = options.ioTimeoutMs ?? 5000;
    this.logger = options.logger ?? silentLogger;
  }

  get isConnected() { return this.connected; }

  async connect(): Promise<void> {
    if (this.connected) return;
    return new Promise((resolve, reject) => {
      const socket = new Socket();
      this.socket = socket;
      this.receiveBuffer = Buffer.alloc(0);

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(new TransportError(`Connection to ${this.host}:${this.port} timed out`));
      }, this.connectTimeoutMs);

      socket.setNoDelay(true);

      socket.on('connect', () => {
        clearTimeout(timeout);
        this.connected = true;
        this.logger.info(`SCPI connected to ${this.host}:${this.port}`);
        resolve();
      });

      socket.on('data', (data: Buffer) => {
        if (this.socket !== socket) return;
        this.receiveBuffer = Buffer.concat([this.receiveBuffer, data]);
        this.drain();
      });

      socket.on('error', (err) => {
        clearTimeout(timeout);
        this.logger.error(`SCPI socket error: ${err.message}`);
        const wrapped = new TransportError(`SCPI socket error: ${err.message}`, { cause: err });
        if (!this.connected) reject(wrapped);
        if (this.socket === socket) this.failPending(wrapped);
      });

      socket.on('close', () => {
        if (this.socket !== socket) return;
        this.socket = null;
        this.logger.info(`SCPI disconnected from ${this.host}:${this.port}`);
        this.connected = false;
        this.failPending(new TransportError('SCPI connection closed'));
        this.emit('disconnected');
      });

      socket.connect(this.port, this.host);
    });
  }

  write(command: string): Promise<void> {
    return this.enqueue(() => {
      this.send(command);
      return Promise.resolve();
    });
  }

  query(command: string): Promise<string> {
    return this.enqueue(() => new Promise<string>((resolve, reject) => {
      this.receiveBuffer = Buffer.alloc(0);
      this.pending = { kind: 'text', resolve, reject };
      this.send(command);
    }));
  }

  queryBinary(command: string): Promise<Uint8Array> {
    return this.enqueue(() => new Promise<Uint8Array>((resolve, reject) => {
      this.receiveBuffer = Buffer.alloc(0);
      this.pending = { kind: 'binary', resolve, reject };
      this.send(command);
    }));
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.connected = false;
    this.receiveBuffer = Buffer.alloc(0);
    socket?.destroy();
  }

  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      if (!this.socket || !this.connected) throw new TransportError('SCPI transport is not connected');
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timedOut = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const err = new TransportError(`SCPI request timed out after ${this.ioTimeoutMs} ms`);
          this.dropSession(err);
          reject(err);
        }, this.ioTimeoutMs);
      });
      try {
        return await Promise.race([op(), timedOut]);
      } finally {
        clearTimeout(timer);
      }
    };
    const next = this.chain.then(run, run);
    this.chain = next.catch(() => undefined);
    return next;
  }

  private send(command: string) {
    this.logger.debug(`> ${command}`);
    this.socket?.write(`${command}\n`);
  }

  private drain() {
    const pending = this.pending;
    if (!pending) return;
    // the LF after a binary block may arrive in a later segment than the payload
    this.skipLineTerminators();

    if (pending.kind === 'text') {
      const newline = this.receiveBuffer.indexOf(0x0a);
      if (newline < 0) return;
      const reply = this.receiveBuffer.toString('ascii', 0, newline).trim();
      this.receiveBuffer = this.receiveBuffer.subarray(newline + 1);
      this.pending = null;
      this.logger.debug(`< ${reply}`);
      pending.resolve(reply);
      return;
    }

    try {
      const block = parseBinaryBlock(this.receiveBuffer);
      if (!block) return;
      this.receiveBuffer = this.receiveBuffer.subarray(block.consumed);
      this.pending = null;
      this.logger.debug(`< #block ${block.payload.length} bytes`);
      pending.resolve(block.payload);
    } catch (err) {
      this.dropSession(err instanceof Error ? err : new TransportError(String(err)));
    }
  }

  private skipLineTerminators() {
    let start = 0;
    while (start < this.receiveBuffer.length && (this.receiveBuffer[start] === 0x0a || this.receiveBuffer[start] === 0x0d)) {
      start++;
    }
    if (start > 0) this.receiveBuffer = this.receiveBuffer.subarray(start);
  }

  /** Reply framing is lost: fail the request and close the socket. */
  private dropSession(err: Error) {
    this.logger.warn(`SCPI session to ${this.host}:${this.port} dropped: ${err.message}`);
    const socket = this.socket;
    this.socket = null;
    this.connected = false;
    this.receiveBuffer = Buffer.alloc(0);
    this.failPending(err);
    socket?.destroy();
    this.emit('disconnected');
  }

  private failPending(err: Error) {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(err);
  }
}
