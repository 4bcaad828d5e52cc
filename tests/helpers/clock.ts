/** Manually advanced clock for expiry tests. */
export class TestClock {
  private current: Date;

  constructor(start = "2030-01-15T12:00:00.000Z") {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  offset(ms: number): Date {
    return new Date(this.current.getTime() + ms);
  }
}
