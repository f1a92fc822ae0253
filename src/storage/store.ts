/**
 * Whole-collection persistence contract used by the domain services.
 *
 * Implementations own exactly one data file. `update` runs load, mutate and
 * save as one step; calls against the same store never interleave.
 */
export interface Store<T> {
  readonly location: string;
  load(): Promise<T[]>;
  save(records: T[]): Promise<void>;
  update<R>(mutate: (records: T[]) => R | Promise<R>): Promise<R>;
}
