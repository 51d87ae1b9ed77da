import { Duplex } from "node:stream";

/**
 * In-memory client connection. Bytes the server writes are collected in
 * `output`; `send` and `hangUp` play the client's side.
 */
export class FakeSocket extends Duplex {
  private readonly written: string[] = [];
  ended = false;

  constructor() {
    super({ allowHalfOpen: true });
  }

  override _read(): void {}

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.written.push(chunk.toString());
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.ended = true;
    callback();
  }

  send(text: string): void {
    this.push(text);
  }

  /** Client shuts down its writing side */
  hangUp(): void {
    this.push(null);
  }

  get output(): string {
    return this.written.join("");
  }
}
