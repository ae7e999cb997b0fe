import { Duration } from "./duration.js";

/** The closed set of values a log attribute can carry. */
export type AttrValue =
  | string
  | number
  | bigint
  | boolean
  | Duration
  | Error
  | Attr
  | readonly string[]
  | Group;

/**
 * A complete key/value pair. In an argument list it stands for a whole
 * pair on its own, so typed attributes and loose `key, value` arguments
 * can be mixed freely.
 */
export class Attr {
  constructor(
    readonly key: string,
    readonly value: AttrValue,
  ) {}
}

/** Attributes nested under one key, rendered as `{k=v k2=v2}`. */
export class Group {
  readonly members: readonly Attr[];

  constructor(members: readonly Attr[]) {
    this.members = [...members];
  }
}

/** Typed constructors for {@link Attr}. */
export const attr = {
  string: (key: string, value: string) => new Attr(key, value),
  int: (key: string, value: number | bigint) =>
    new Attr(key, typeof value === "bigint" ? value : Math.trunc(value)),
  float: (key: string, value: number) => new Attr(key, value),
  bool: (key: string, value: boolean) => new Attr(key, value),
  duration: (key: string, value: Duration) => new Attr(key, value),
  strings: (key: string, value: readonly string[]) => new Attr(key, [...value]),
  error: (key: string, value: Error) => new Attr(key, value),
  any: (key: string, value: AttrValue) => new Attr(key, value),
  /** Nest several attributes under one key, rendered as `{k=v k2=v2}`. */
  group: (key: string, ...members: Attr[]) => new Attr(key, new Group(members)),
};

export { Duration };
