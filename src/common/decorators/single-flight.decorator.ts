type FlightKey = string | number | symbol;

/**
 * Generates a stable string key from method arguments.
 * Falls back to a deterministic string representation if JSON serialization fails.
 */
const defaultKey = (args: unknown[]): string => {
  try {
    return JSON.stringify(args);
  } catch {
    return `args_${args.length}_${args.map((arg, i) => `${i}:${typeof arg}`).join('_')}`;
  }
};

/**
 * SingleFlight decorator for method deduplication.
 * Concurrent calls that resolve to the same key share one in-flight promise;
 * the key is released as soon as that promise settles.
 *
 * @param keyResolver - Optional function to generate the flight key from method arguments
 */
export function SingleFlight<KArgs extends unknown[]>(
  keyResolver?: (...args: KArgs) => FlightKey,
) {
  return <Args extends KArgs, Result>(
    _target: object,
    propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: Args) => Promise<Result>>,
  ): void => {
    const original = descriptor.value;
    if (!original) {
      throw new Error(
        `@SingleFlight can only decorate methods (${String(propertyKey)})`,
      );
    }

    const flights = new WeakMap<object, Map<FlightKey, Promise<Result>>>();

    descriptor.value = function (this: object, ...args: Args): Promise<Result> {
      let states = flights.get(this);
      if (!states) {
        states = new Map<FlightKey, Promise<Result>>();
        flights.set(this, states);
      }

      const key = keyResolver ? keyResolver(...args) : defaultKey(args);
      const inFlight = states.get(key);
      if (inFlight) {
        return inFlight;
      }

      const activeStates = states;
      const promise = Promise.resolve()
        .then(() => original.apply(this, args))
        .finally(() => {
          activeStates.delete(key);
        });

      activeStates.set(key, promise);
      return promise;
    };
  };
}
