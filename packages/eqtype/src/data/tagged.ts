/**
 * Tagged Values (dependent pairs)
 *
 * A tagged value pairs a discriminant `tag` with a payload whose type depends
 * on the tag. Two encodings are provided:
 *
 * - **Closed families**: a type map `M` from tags to payload types.
 *   `TaggedUnion<{ n: number; s: string }>` is
 *   `TaggedValue<"n", number> | TaggedValue<"s", string>`.
 * - **Open families**: any tag type `I` with a uniform payload box `T`,
 *   e.g. a vector length paired with a `number[]` of that length.
 *
 * @example
 * ```typescript
 * type Shape = { circle: number; rect: [number, number] };
 * const mk = tagger<Shape>();
 * const c = mk("circle", 2);         // TaggedValue<"circle", number>
 * const r = mk("rect", [1, 3]);      // TaggedValue<"rect", [number, number]>
 * ```
 */

export interface TaggedValue<I, T> {
  readonly tag: I;
  readonly tagged: T;
}

/**
 * Union of every tagged value a closed family `M` allows.
 */
export type TaggedUnion<M> = { [K in keyof M]: TaggedValue<K, M[K]> }[keyof M];

export function Tagged<I, T>(tag: I, tagged: T): TaggedValue<I, T> {
  return { tag, tagged };
}

/**
 * A constructor fixed to a closed family, so payload types follow the tag.
 */
export function tagger<M>(): <K extends keyof M>(tag: K, tagged: M[K]) => TaggedValue<K, M[K]> {
  return (tag, tagged) => ({ tag, tagged });
}

export function tag<I, T>(u: TaggedValue<I, T>): I {
  return u.tag;
}

export function tagged<I, T>(u: TaggedValue<I, T>): T {
  return u.tagged;
}

/**
 * The payload of `v`, read at the index of `u`.
 *
 * Only meaningful once `u.tag` and `v.tag` are known to be equal: it is the
 * transport of `v.tagged` along that equality.
 */
export function taggedAs<M, K extends keyof M>(
  u: TaggedValue<K, M[K]>,
  v: TaggedUnion<M>,
): M[K] {
  // tag equality is checked by every caller
  return v.tagged as M[K];
}
