/** Freezes `value` and everything reachable from it. */
export const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  const children: unknown[] = Object.values(value)
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) deepFreeze(child)
  }
  return Object.freeze(value)
}
