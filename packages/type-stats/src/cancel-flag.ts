/**
 * Cooperative cancellation shared by every scan task of a run. Backed by a
 * SharedArrayBuffer so worker threads observe it without messaging.
 */
export class CancelFlag {
  public readonly buffer: SharedArrayBuffer;
  private readonly view: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.buffer = buffer;
    this.view = new Int32Array(buffer);
  }

  cancel(): void {
    Atomics.store(this.view, 0, 1);
  }

  get cancelled(): boolean {
    return Atomics.load(this.view, 0) === 1;
  }
}
