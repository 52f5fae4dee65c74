import { DuplicateSessionTokenError } from "./errors";

/**
 * Token → handle map shared by every controller interaction in the process.
 *
 * Each operation is a single synchronous Map access, so concurrent interactions on
 * the event loop see register/lookup/remove as atomic. Keep it that way: an `await`
 * between reading and writing the map would break that guarantee.
 */
export class SessionRegistry<THandle> {
  private entries = new Map<string, THandle>();

  get size(): number {
    return this.entries.size;
  }

  register(token: string, handle: THandle): void {
    if (this.entries.has(token)) {
      throw new DuplicateSessionTokenError(token);
    }
    this.entries.set(token, handle);
  }

  lookup(token: string): THandle | undefined {
    return this.entries.get(token);
  }

  /** Returns false when the token was not registered. */
  remove(token: string): boolean {
    return this.entries.delete(token);
  }

  list(): Array<[token: string, handle: THandle]> {
    return Array.from(this.entries.entries());
  }

  clear(): void {
    this.entries.clear();
  }
}
