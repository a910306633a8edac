/**
 * Extern dispatcher: resolves selector strings such as `console:print` or
 * `fast|slow:hash` to host capabilities.
 */

import { ExternError, KernelError, isHostStackOverflow } from "../errors/errors.js";
import type { Value } from "../object/object.js";
import type { Span } from "../token/token.js";

/**
 * A host capability. It may throw a KernelError; anything else it throws is
 * wrapped in an ExternError naming the selector.
 */
export type Capability = (args: readonly Value[], span?: Span) => Value;

/**
 * Parsed form of a selector.
 */
export interface Selector {
  readonly text: string;
  /** Named backends in the order they must be tried. Empty for a bare selector. */
  readonly backends: readonly string[];
  readonly capability: string;
}

const SELECTOR = /^(?:([A-Za-z0-9_]+(?:\|[A-Za-z0-9_]+)*):)?([A-Za-z0-9_]+)$/;

/**
 * Parse `backend1|backend2:capability` or a bare `capability`.
 */
export function parseSelector(text: string, span?: Span): Selector {
  const m = SELECTOR.exec(text);
  if (!m) {
    throw new ExternError(`malformed selector '${text}'`, text, span);
  }
  return {
    text,
    backends: m[1] === undefined ? [] : m[1].split("|"),
    capability: m[2],
  };
}

/**
 * ExternDispatcher holds capabilities keyed by (backend, capability).
 */
export class ExternDispatcher {
  private backends: Map<string, Map<string, Capability>> = new Map();

  /**
   * Register one capability of a backend, replacing any previous one.
   */
  register(backend: string, capability: string, fn: Capability): this {
    parseSelector(`${backend}:${capability}`);
    let caps = this.backends.get(backend);
    if (!caps) {
      caps = new Map();
      this.backends.set(backend, caps);
    }
    caps.set(capability, fn);
    return this;
  }

  /**
   * Register several capabilities of one backend.
   */
  registerBackend(backend: string, capabilities: Readonly<Record<string, Capability>>): this {
    for (const [name, fn] of Object.entries(capabilities)) {
      this.register(backend, name, fn);
    }
    return this;
  }

  /** Registered backend names, in registration order. */
  backendNames(): string[] {
    return [...this.backends.keys()];
  }

  /**
   * Resolve a selector. Named backends are tried left to right and no other
   * backend is ever substituted; a bare selector takes the first backend,
   * in registration order, that provides the capability.
   */
  resolve(text: string, span?: Span): Capability {
    const selector = parseSelector(text, span);

    if (selector.backends.length === 0) {
      for (const caps of this.backends.values()) {
        const fn = caps.get(selector.capability);
        if (fn) return fn;
      }
      throw new ExternError(`no backend provides capability '${selector.capability}'`, text, span);
    }

    const reasons: string[] = [];
    for (const name of selector.backends) {
      const caps = this.backends.get(name);
      if (!caps) {
        reasons.push(`backend '${name}' is not registered`);
        continue;
      }
      const fn = caps.get(selector.capability);
      if (fn) return fn;
      reasons.push(`backend '${name}' has no capability '${selector.capability}'`);
    }
    throw new ExternError(`cannot resolve '${text}': ${reasons.join("; ")}`, text, span);
  }

  /**
   * Resolve and call a capability.
   */
  invoke(text: string, args: readonly Value[], span?: Span): Value {
    const fn = this.resolve(text, span);
    try {
      return fn(args, span);
    } catch (err) {
      if (err instanceof KernelError) {
        throw span === undefined ? err : err.withSpan(span);
      }
      if (isHostStackOverflow(err)) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ExternError(`'${text}' failed: ${message}`, text, span);
    }
  }
}
