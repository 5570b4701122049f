/**
 * Generic registry for named, lazily built instances.
 *
 * Each name is constructed at most once per registry: the first successful
 * build is kept for the life of the process and returned on every later
 * `get`. A failed build is not remembered, so a later `get` retries it.
 */
import { Effect } from "effect";
import { RegistryError } from "./errors.js";

export class Registry<T, E = never> {
  private readonly _factories = new Map<string, Effect.Effect<T, E>>();
  private readonly _instances = new Map<string, T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: Effect.Effect<T, E>): void {
    this._factories.set(name, factory);
  }

  get(name: string): Effect.Effect<T, E | RegistryError> {
    return Effect.suspend((): Effect.Effect<T, E | RegistryError> => {
      const existing = this._instances.get(name);
      if (existing !== undefined) return Effect.succeed(existing);

      const factory = this._factories.get(name);
      if (!factory) {
        const avail = this.list().join(", ");
        return Effect.fail(
          new RegistryError({
            message: `[${this.subsystem}] Unknown ${this.subsystem} "${name}". Available: ${avail}`,
          }),
        );
      }

      // Two concurrent first calls may both build; the first one stored wins.
      return Effect.map(factory, (built) => {
        const winner = this._instances.get(name);
        if (winner !== undefined) return winner;
        this._instances.set(name, built);
        return built;
      });
    });
  }

  has(name: string): boolean {
    return this._factories.has(name);
  }

  list(): string[] {
    return [...this._factories.keys()];
  }
}
