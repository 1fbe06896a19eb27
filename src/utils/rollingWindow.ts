// src/utils/rollingWindow.ts

export type CallResult = "success" | "failure";

/**
 * Fixed-size ring of the most recent call results.
 */
export class RollingWindow {
  private readonly size: number;
  private readonly buf: CallResult[];
  private next = 0;
  private filled = false;
  private failureCount = 0;

  constructor(size: number) {
    if (!Number.isInteger(size) || size <= 0) throw new Error(`window size must be a positive integer (got ${size})`);
    this.size = size;
    this.buf = new Array<CallResult>(size).fill("success");
  }

  record(result: CallResult): void {
    if (this.filled && this.buf[this.next] === "failure") this.failureCount -= 1;
    this.buf[this.next] = result;
    if (result === "failure") this.failureCount += 1;

    this.next = (this.next + 1) % this.size;
    if (this.next === 0) this.filled = true;
  }

  count(): number {
    return this.filled ? this.size : this.next;
  }

  failures(): number {
    return this.failureCount;
  }

  failureRate(): number {
    const n = this.count();
    return n === 0 ? 0 : this.failureCount / n;
  }

  reset(): void {
    this.next = 0;
    this.filled = false;
    this.failureCount = 0;
    this.buf.fill("success");
  }
}
