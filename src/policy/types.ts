import type { InputEvent, Point } from "../input/events";

/** Closed set of policies. External rule files name them by these strings. */
export type PolicyKind =
  | "random"
  | "deterministic"
  | "named_file"
  | "font"
  | "circle";

export const POLICY_KINDS: ReadonlyArray<PolicyKind> = [
  "random",
  "deterministic",
  "named_file",
  "font",
  "circle",
];

export function isPolicyKind(s: unknown): s is PolicyKind {
  return (
    typeof s === "string" && (POLICY_KINDS as ReadonlyArray<string>).includes(s)
  );
}

export type PolicyArgs = ReadonlyArray<string>;

/** Which policy to run for an event, as decided by a mapper. */
export type PolicyCall = Readonly<{
  policy: PolicyKind;
  args: PolicyArgs | undefined;
}>;

export type Rgb = readonly [r: number, g: number, b: number];

export type ResourceResponse<H> = Readonly<{
  kind: "resource";
  name: string;
  handle: H;
}>;

export type GlyphResponse = Readonly<{
  kind: "glyph";
  text: string;
  color: Rgb;
  fontSize: number;
}>;

export type CircleResponse = Readonly<{
  kind: "circle";
  center: Point;
  radius: number;
  color: Rgb;
}>;

export type SoundResponse<S> = ResourceResponse<S>;

export type ImageResponse<I> =
  | ResourceResponse<I>
  | GlyphResponse
  | CircleResponse;

export type ResponsePolicy<R> = {
  readonly kind: PolicyKind;
  /**
   * Reject a setup that could never serve `args`. Called once per route at
   * engine construction, before any event is handled.
   */
  validate(args: PolicyArgs | undefined): void;
  select(event: InputEvent, args: PolicyArgs | undefined): R;
};

/** The two independent output streams an event is routed to. */
export type Channel = "sound" | "image";
