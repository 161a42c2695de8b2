// @filename: symbol.ts
/**
 * Well-known symbols used for interop and resource cleanup.
 *
 * `Symbol.observable` is what `Observable.from()` and `pipe()` look for on
 * foreign producers, and what `Property` exposes so a Property can be fed
 * straight into any Observable-consuming API. `Symbol.dispose` and
 * `Symbol.asyncDispose` back the `using` support on subscriptions.
 *
 * Each symbol is installed on the global `Symbol` once, only when the host
 * does not already provide it, so several copies of this module (or other
 * libraries doing the same) agree on a single registered symbol.
 *
 * @module
 */
export interface SymbolConstructor
  extends Omit<typeof globalThis.Symbol, "observable"> {
  /**
   * Symbol under which an object returns its Observable view.
   *
   * @see {@link https://github.com/tc39/proposal-observable | TC39 Observable proposal}
   */
  readonly observable: unique symbol;
}

function install(name: "observable" | "dispose" | "asyncDispose"): void {
  if (typeof Reflect.get(globalThis.Symbol, name) === "symbol") return;

  Reflect.defineProperty(globalThis.Symbol, name, {
    value: globalThis.Symbol.for(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

install("dispose");
install("asyncDispose");
install("observable");

/**
 * The global `Symbol`, typed with `observable`.
 */
export const Symbol: SymbolConstructor = globalThis.Symbol as unknown as SymbolConstructor;
