/** Node's `util.inspect.custom`, without importing node:util into the core. */
export const INSPECT: unique symbol = Symbol.for('nodejs.util.inspect.custom');
