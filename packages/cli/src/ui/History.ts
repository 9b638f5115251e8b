import { SPARKLINE_POINTS } from '@tickscope/shared';

/** Fixed-capacity series; the oldest point drops off once full. */
export class MetricHistory {
  private points: number[] = [];

  constructor(private readonly capacity: number = SPARKLINE_POINTS) {}

  push(value: number): void {
    this.points.push(value);
    if (this.points.length > this.capacity) {
      this.points.splice(0, this.points.length - this.capacity);
    }
  }

  values(): number[] {
    return [...this.points];
  }

  latest(): number | null {
    return this.points.length > 0 ? this.points[this.points.length - 1] : null;
  }

  get size(): number {
    return this.points.length;
  }
}
