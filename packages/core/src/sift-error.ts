/**
 * SiftError - errors built from facets and owned by boundaries.
 *
 * An error definition lists its facets (marker traits and data traits) and a
 * message function; there is no class hierarchy. Callers discriminate by
 * exact definition (`ErrX.is`), by facet (`SiftError.has`) or by domain
 * (`boundary.is`).
 *
 * A boundary owns a domain; every error it defines carries the code `<domain>.<name>`.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";

// ============================================================================
// Facets
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Phantom carrier for data that belongs to one error definition only */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

export const ErrFacet = StaticTypeCompanion({
  /** A facet that carries no data */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  /** A facet whose data fields every error carrying it must supply */
  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    const facet: ErrDataFacet<TData> = Object.freeze({ kind: "data" as const, name });
    return facet;
  },

  props<T extends Record<string, unknown>>(): ErrProps<T> {
    const props: ErrProps<T> = { _kind: "props" };
    return props;
  },
});

/** Data contributed by one facet; markers contribute {} */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
>;

// ============================================================================
// Definitions and boundaries
// ============================================================================

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  readonly domain: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D): SiftError<Fs>;
  is(err: unknown): err is SiftError<Fs> & { readonly data: MergeFacetProps<Fs> & D };
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error whose code is `<domain>.<code>` */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  /** True for any error defined by this boundary */
  is(err: unknown): err is SiftError;
}

// ============================================================================
// SiftError
// ============================================================================

export interface SiftError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;
  toJSON(): SiftErrorJSON;
  /** `SiftError: <code>: <message>`, then a data line when there is data */
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface SiftErrorJSON {
  code: string;
  domain: string;
  message: string;
  data: Record<string, unknown>;
  facets: string[];
  stack?: string;
}

const UNKNOWN = "unknown";

/** Stack frames without the message line, and without the frame of create() itself */
function stackFrames(stack: string | undefined): string[] {
  if (!stack) return [];
  return stack
    .split("\n")
    .filter((line) => line.trimStart().startsWith("at "))
    .filter((line, i) => !(i === 0 && line.includes("at create (")));
}

class SiftErrorImpl extends Error implements SiftError {
  readonly code: string;
  readonly domain: string;
  readonly data: Record<string, unknown>;
  readonly facetNames: ReadonlySet<string>;

  static {
    Inspect(this, (self, opts) => ({
      format: self.prettyPrint({color: opts.colors, includeStackTrace: true}),
      params: [],
    }));
  }

  constructor(code: string, domain: string, message: string, facetNames: ReadonlySet<string>, data: Record<string, unknown>) {
    super(message);
    this.name = `SiftError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.data = { ...data };
    this.facetNames = facetNames;
  }

  /** Any thrown value as a SiftError; non-SiftErrors get the code "unknown" */
  static from(thrown: unknown): SiftError {
    if (thrown instanceof SiftErrorImpl) return thrown;
    const message = thrown instanceof Error ? thrown.message : String(thrown);
    const wrapped = new SiftErrorImpl(UNKNOWN, UNKNOWN, message, new Set<string>(), {});
    if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
    return wrapped;
  }

  toJSON(): SiftErrorJSON {
    return {
      code: this.code,
      domain: this.domain,
      message: this.message,
      data: this.data,
      facets: [...this.facetNames],
      stack: this.stack,
    };
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const paint = (code: number) => (text: string) => (opts?.color ? `\x1b[${code}m${text}\x1b[0m` : text);
    const red = paint(31);
    const dim = paint(2);

    const lines = [`SiftError: ${red(this.code)}: ${this.message}`];
    if (Object.keys(this.data).length > 0) {
      lines.push(`  ${dim(`└ data: ${JSON.stringify(this.data)}`)}`);
    }

    const frames = opts?.includeStackTrace ? stackFrames(this.stack) : [];
    if (frames.length > 0) {
      lines.push(`  ${dim("➝ Stack trace:")}`);
      lines.push(...frames.map(dim));
    }
    return lines.join("\n");
  }
}

function defineError<const Fs extends readonly ErrFacetAny[], D extends Record<string, unknown> = {}>(
  code: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D): SiftError<Fs> {
    const err = new SiftErrorImpl(
      code,
      domain,
      opts.message(data),
      facetNames,
      data as Record<string, unknown>,
    ) as unknown as SiftError<Fs>;
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code,
    domain,
    facets: opts.facets,
    create,

    is(err: unknown): err is SiftError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
      return err instanceof SiftErrorImpl && err.code === code;
    },
  });
}

export const SiftError = StaticTypeCompanion({
  /**
   * A domain that owns a set of errors:
   *
   *   const Filter = SiftError.boundary("filter");
   *   const ErrEmptyList = Filter.define("EmptyList", { facets: [BadInput], message: () => "empty list" });
   *   ErrEmptyList.code // "filter.EmptyList"
   */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        return defineError(`${domain}.${code}`, domain, opts);
      },

      is(err: unknown): err is SiftError {
        return err instanceof SiftErrorImpl && err.domain === domain;
      },
    };
  },

  isSiftError(err: unknown): err is SiftError {
    return err instanceof SiftErrorImpl;
  },

  /** True when `err` is a SiftError carrying `facet`; narrows `data` for data facets */
  has<F extends ErrFacetAny>(err: unknown, facet: F): err is SiftError & { readonly data: FacetProps<F> } {
    return err instanceof SiftErrorImpl && err.facetNames.has(facet.name);
  },

  /** Returns SiftErrors unchanged; anything else becomes an "unknown" error keeping its stack */
  wrap(err: unknown): SiftError {
    return SiftErrorImpl.from(err);
  },
});
