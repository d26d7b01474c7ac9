import type { PathName } from '../types.js';

export interface Sink<T> {
  readonly name: PathName;
  write(item: T): Promise<void>;
  close(): Promise<void>;
  onFailure?(listener: (error: Error, unflushed: number) => void): void;
}
