// Generator bodies behind the lazy sequence operators. Each one opens a single
// traversal of its source and stops pulling from it as soon as it can.

export function* mapValues<T, U>(
  source: Iterable<T>,
  fn: (value: T, index: number) => U,
): Generator<U, void, undefined> {
  let index = 0;
  for (const value of source) {
    yield fn(value, index++);
  }
}

export function* filterValues<T>(
  source: Iterable<T>,
  predicate: (value: T, index: number) => boolean,
): Generator<T, void, undefined> {
  let index = 0;
  for (const value of source) {
    if (predicate(value, index++)) yield value;
  }
}

export function* takeValuesWhile<T>(
  source: Iterable<T>,
  predicate: (value: T) => boolean,
): Generator<T, void, undefined> {
  for (const value of source) {
    if (!predicate(value)) return;
    yield value;
  }
}

export function* skipValuesWhile<T>(
  source: Iterable<T>,
  predicate: (value: T) => boolean,
): Generator<T, void, undefined> {
  let skipping = true;
  for (const value of source) {
    if (skipping && predicate(value)) continue;
    skipping = false;
    yield value;
  }
}

export function* takeValues<T>(
  source: Iterable<T>,
  count: number,
): Generator<T, void, undefined> {
  if (count === 0) return;

  let taken = 0;
  for (const value of source) {
    yield value;
    // Stop before the source is asked for a value nobody wants.
    if (++taken >= count) return;
  }
}

export function* skipValues<T>(
  source: Iterable<T>,
  count: number,
): Generator<T, void, undefined> {
  let skipped = 0;
  for (const value of source) {
    if (skipped < count) {
      skipped++;
      continue;
    }
    yield value;
  }
}
