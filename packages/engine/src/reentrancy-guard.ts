import { ReentrantCallError } from "./errors";

/**
 * Busy flag held for the whole of one top-level engine call. A nested call
 * made by a collaborator while the flag is set fails before it runs.
 */
export class ReentrancyGuard {
  private entered: string | null = null;

  get locked(): boolean {
    return this.entered !== null;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.entered !== null) throw new ReentrantCallError(operation);
    this.entered = operation;
    try {
      return fn();
    } finally {
      this.entered = null;
    }
  }
}
