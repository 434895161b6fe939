/**
 * A pull-based stage. Each call takes as many inputs from `source` as it
 * needs and returns one output, or `undefined` once it has nothing left.
 */
export interface BatchingStep<In, Out> {
  call(source: Iterator<In>): Out | undefined;
}

export function* batching<In, Out>(source: Iterable<In>, step: BatchingStep<In, Out>): Generator<Out, void, undefined> {
  const it = source[Symbol.iterator]();
  for (;;) {
    const out = step.call(it);
    if (out === undefined) return;
    yield out;
  }
}

export function* mapItems<In, Out>(source: Iterable<In>, f: (value: In) => Out): Generator<Out, void, undefined> {
  for (const value of source) yield f(value);
}
