/**
 * SdkError - errors composed from facets, grouped by boundary.
 *
 * A definition has a code ("client.connect_failed"), a list of facets and a
 * message built from its data. Callers tell errors apart by definition
 * (`ErrConnectFailed.is(err)`) or by facet (`SdkError.has(err, NotAvailable)`).
 *
 * Errors cross a transport as SerializedError. reconstitute() restores code,
 * facets and data, so both checks keep working on the receiving side.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";

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

/** Data carried by one error definition only, declared with ErrFacet.props */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
> & Record<string, unknown>;

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    const facet: ErrDataFacet<TData> = { kind: "data", name };
    return Object.freeze(facet);
  },

  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// ============================================================================
// Public shapes
// ============================================================================

export interface SdkError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  /** Free text appended to the message at creation */
  readonly context?: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: SdkError;
  prettyPrint(opts?: { color?: boolean }): string;
}

export interface ErrorDef<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[], D = {}> {
  readonly code: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D, context?: string, cause?: unknown): SdkError<Fs>;
  is(err: unknown): err is SdkError<Fs> & { readonly data: MergeFacetProps<Fs> & D };
  /** Runs fn; whatever it throws becomes the cause of this error */
  wrap<T>(data: MergeFacetProps<Fs> & D, fn: () => T): T;
  wrapAsync<T>(data: MergeFacetProps<Fs> & D, fn: () => Promise<T>): Promise<T>;
}

type DefineOptions<Fs extends readonly ErrFacetAny[], P> = {
  customProps?: P;
  facets: Fs;
  message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string;
};

/** Owner of a domain; every code it defines starts with `${domain}.` */
export interface ErrorBoundary {
  readonly domain: string;
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: DefineOptions<Fs, P>,
  ): ErrorDef<Fs, InferPropsData<P>>;
}

/** Wire form of any thrown value. A plain Error keeps only its message. */
export interface SerializedError {
  message: string;
  code?: string;
  boundary?: string;
  context?: string;
  facets?: string[];
  data?: Record<string, unknown>;
  cause?: SerializedError;
}

// ============================================================================
// Implementation
// ============================================================================

const UNKNOWN = "unknown";

class FacetedError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error implements SdkError<Fs> {
  declare readonly cause?: SdkError;

  constructor(
    readonly code: string,
    readonly domain: string,
    message: string,
    readonly facetNames: ReadonlySet<string>,
    readonly data: MergeFacetProps<Fs>,
    readonly context?: string,
    cause?: SdkError,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = `SdkError[${code}]`;
  }

  prettyPrint(opts: { color?: boolean } = {}): string {
    const paint = opts.color ? ansi : plain;
    const lines = [`SdkError: ${describeError(this, "", paint, this.cause === undefined)}`];
    let indent = "  ";
    for (let cause = this.cause; cause; cause = cause.cause) {
      lines.push(`${indent}${paint.dim("└ caused by:")} ${describeError(cause, indent, paint, cause.cause === undefined)}`);
      indent += "  ";
    }
    return lines.join("\n");
  }
}

interface Paint {
  red(text: string): string;
  dim(text: string): string;
}

const plain: Paint = { red: (text) => text, dim: (text) => text };
const ansi: Paint = {
  red: (text) => `\x1b[31m${text}\x1b[0m`,
  dim: (text) => `\x1b[2m${text}\x1b[0m`,
};

function describeError(err: SdkError, indent: string, paint: Paint, last: boolean): string {
  const head = `${paint.red(err.code)}: ${err.message}`;
  if (Object.keys(err.data).length === 0) return head;
  return `${head}\n${indent}  ${paint.dim(`${last ? "└" : "├"} data: ${JSON.stringify(err.data)}`)}`;
}

function toSdkError(thrown: unknown): SdkError {
  if (thrown instanceof FacetedError) return thrown;
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  const wrapped = new FacetedError(UNKNOWN, UNKNOWN, message, new Set<string>(), {});
  if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
  return wrapped;
}

function defineError<const Fs extends readonly ErrFacetAny[], D>(
  code: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames: ReadonlySet<string> = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D, context?: string, cause?: unknown): SdkError<Fs> {
    const base = opts.message(data);
    const message = context ? `${base}: ${context}` : base;
    const err = new FacetedError<Fs>(
      code,
      domain,
      message,
      facetNames,
      Object.assign({}, data),
      context,
      cause === undefined ? undefined : toSdkError(cause),
    );
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code,
    facets: opts.facets,
    create,

    is(err: unknown): err is SdkError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
      return err instanceof FacetedError && err.code === code;
    },

    wrap<T>(data: MergeFacetProps<Fs> & D, fn: () => T): T {
      try {
        return fn();
      } catch (thrown) {
        throw create(data, undefined, thrown);
      }
    },

    async wrapAsync<T>(data: MergeFacetProps<Fs> & D, fn: () => Promise<T>): Promise<T> {
      try {
        return await fn();
      } catch (thrown) {
        throw create(data, undefined, thrown);
      }
    },
  });
}

// ============================================================================
// Companion
// ============================================================================

export const SdkError = StaticTypeCompanion({
  boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: DefineOptions<Fs, P>,
      ): ErrorDef<Fs, InferPropsData<P>> {
        return defineError<Fs, InferPropsData<P>>(`${domain}.${code}`, domain, opts);
      },
    };
  },

  /** For a data facet, also narrows err.data */
  has<F extends ErrFacetAny>(err: unknown, facet: F): err is SdkError & { readonly data: FacetProps<F> } {
    return err instanceof FacetedError && err.facetNames.has(facet.name);
  },

  /** Any thrown value as an SdkError; SdkErrors come back unchanged */
  wrap(err: unknown): SdkError {
    return toSdkError(err);
  },

  serialize(err: unknown): SerializedError {
    const sdk = toSdkError(err);
    if (sdk.code === UNKNOWN && !(err instanceof FacetedError)) {
      return { message: sdk.message };
    }
    const serialized: SerializedError = {
      message: sdk.message,
      code: sdk.code,
      boundary: sdk.domain,
      facets: [...sdk.facetNames],
      data: Object.assign({}, sdk.data),
    };
    if (sdk.context !== undefined) serialized.context = sdk.context;
    if (sdk.cause) serialized.cause = SdkError.serialize(sdk.cause);
    return serialized;
  },

  reconstitute(serialized: SerializedError): SdkError {
    return new FacetedError(
      serialized.code ?? UNKNOWN,
      serialized.boundary ?? UNKNOWN,
      serialized.message,
      Object.freeze(new Set(serialized.facets ?? [])),
      serialized.data ?? {},
      serialized.context,
      serialized.cause ? SdkError.reconstitute(serialized.cause) : undefined,
    );
  },
});
