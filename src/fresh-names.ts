/**
 * Fresh identifier source for one compilation unit.
 *
 * The counter is the only mutable state shared between passes and the
 * printer. Create one per unit; never share an instance across units that
 * are compiled concurrently.
 */
export class FreshNames {
  private counter = 0;

  /** Next name with the given prefix: loop_1, loop_2, ... */
  next(prefix: string): string {
    this.counter++;
    return `${prefix}_${this.counter}`;
  }

  /** Number of names handed out so far */
  get count(): number {
    return this.counter;
  }
}
