/**
 * Simple Moving Average — 고정 길이 링 버퍼
 */
export class SMA {
  private readonly period: number;
  private readonly buffer: number[];
  private index: number = 0;
  private count: number = 0;
  private sum: number = 0;

  constructor(period: number) {
    if (period < 1) throw new Error('SMA period must be >= 1');
    this.period = period;
    this.buffer = new Array<number>(period).fill(0);
  }

  update(value: number): number {
    if (this.count === this.period) {
      this.sum -= this.buffer[this.index]!;
    } else {
      this.count++;
    }
    this.buffer[this.index] = value;
    this.sum += value;
    this.index = (this.index + 1) % this.period;
    return this.value;
  }

  get value(): number {
    return this.count === 0 ? 0 : this.sum / this.count;
  }

  get isReady(): boolean {
    return this.count === this.period;
  }

  reset(): void {
    this.buffer.fill(0);
    this.index = 0;
    this.count = 0;
    this.sum = 0;
  }
}
