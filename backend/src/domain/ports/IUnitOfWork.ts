/**
 * Port for grouping store and broker writes so they commit or roll back together
 */
export interface IUnitOfWork {
  run<T>(work: () => Promise<T>): Promise<T>;
}

export const UNIT_OF_WORK = Symbol('IUnitOfWork');
