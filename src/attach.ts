/**
 * Association of dependency lists with arbitrary content objects.
 */

import type { HtmlDependency } from './descriptor.js';

const attached = new WeakMap<object, readonly HtmlDependency[]>();

function isDependencyList(value: HtmlDependency | readonly HtmlDependency[]): value is readonly HtmlDependency[] {
  return Array.isArray(value);
}

/** Dependencies attached to `x`, in the order they were set. */
export function htmlDependencies(x: object): readonly HtmlDependency[] {
  return attached.get(x) ?? [];
}

/** Replace the dependencies attached to `x`. Nothing is merged. */
export function setHtmlDependencies(x: object, value: HtmlDependency | readonly HtmlDependency[]): void {
  attached.set(x, Object.freeze(isDependencyList(value) ? [...value] : [value]));
}

export function attachDependencies<T extends object>(x: T, value: HtmlDependency | readonly HtmlDependency[]): T {
  setHtmlDependencies(x, value);
  return x;
}
