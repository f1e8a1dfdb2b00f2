import { z } from 'zod';
import { ApiError } from '../error/apiError.js';
import { ArgumentError } from '../error/argumentError.js';
import { HTTPError } from '../error/httpError.js';
import { SchemaError } from '../error/schemaError.js';
import { getUnknownFieldError } from '../error/unknownFieldError.js';
import { AliasTable } from '../schema/aliasTable.js';
import type { FieldDescriptor } from '../schema/field.js';
import { EMPTY_REGISTRY, type SchemaRegistry } from '../schema/registry.js';
import type { KindClass } from '../schema/structured.js';
import { getResponseData } from '../utils/getResponseData.js';
import { validatorSync } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { ApiErrorRecord } from './apiErrorRecord.js';
import type { ResultMode, ShapeContext } from './results.js';
import type { CallArgs, HttpMethod, HttpSession, SessionRequest } from './types.js';

/** Largest page a paginated endpoint asks for unless declared otherwise. */
export const DEFAULT_MAX_PAGE_SIZE = 200;

const METHODS: ReadonlySet<string> = new Set(['get', 'post', 'put', 'patch', 'delete']);
const PLACEHOLDER = /\{([^}]*)\}/g;
const TOP_PARAM = /(\$|%24)top=\d*/;
const JSON_HEADERS = { 'Content-Type': 'application/json' };

const errorRecordSchema = z.object({
  code: z.string().nullish(),
  detailedCode: z.string().nullish(),
  hint: z.string().nullish(),
  properties: z.array(z.string()).nullish(),
  referenceCode: z.string().nullish(),
  resourceUrl: z.string().nullish(),
  text: z.string().nullish(),
});

const faultBodySchema = z.object({ errors: z.array(errorRecordSchema) });

const pageSchema = z.object({
  items: z.array(z.unknown()),
  count: z.number().optional(),
  nextPageLink: z.string().nullish(),
});

/** Declaration of one remote operation. */
export interface EndpointOptions<T> {
  /** `Service.method`, used in messages and logs. */
  name: string;
  /** Path relative to the API root, with `{placeholder}`s bound from call arguments. */
  path: string;
  method: HttpMethod;
  /** Fields sent as query parameters. A leading `$` is part of the wire name only. */
  query?: readonly string[];
  /** Registry fields sent in the body. */
  body?: readonly string[];
  /** Path placeholders also copied into the body. */
  pathToBody?: readonly string[];
  /** Fields declared on the endpoint itself. */
  fields?: Readonly<Record<string, FieldDescriptor>>;
  /** Kind whose fields the body carries. */
  kind?: KindClass;
  /** How the response becomes the result. */
  result: ResultMode<T>;
  /** Largest page requested. Paginated endpoints only. */
  maxPageSize?: number;
  /** Wire keys dropped from mapping payloads before result shaping. */
  suppressKeys?: readonly string[];
  /** Registry the `query`, `body` and `pathToBody` names come from. */
  registry?: SchemaRegistry;
}

/** A call, ready to send. */
interface PreparedCall {
  route: string;
  request: SessionRequest;
  limit: number;
}

function stripDollar(name: string): string {
  return name.replace(/^\$+/, '');
}

function placeholders(path: string): string[] {
  return [...new Set(Array.from(path.matchAll(PLACEHOLDER), (match) => match[1]))];
}

function overlapping(a: Iterable<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((name) => b.has(name));
}

/**
 * One remote operation: its route, the fields it accepts and how its result is shaped.
 *
 * Declaration mistakes throw {@link SchemaError} when the endpoint is created; everything
 * that can go wrong during a call comes back as the error of the returned tuple.
 *
 * @typeParam T - Result of a successful call.
 */
export class Endpoint<T> {
  readonly name: string;
  readonly path: string;
  readonly method: HttpMethod;
  /** Every field the endpoint answers to. */
  readonly table: AliasTable;
  readonly maxPageSize: number;
  readonly #pathParams: readonly string[];
  readonly #pathToBody: readonly string[];
  readonly #query: readonly string[];
  readonly #result: ResultMode<T>;
  readonly #shapeContext: ShapeContext;

  constructor(options: EndpointOptions<T>) {
    const { name, path, method, result, kind, registry = EMPTY_REGISTRY } = options;
    const query = options.query ?? [];
    const body = options.body ?? [];
    const pathToBody = options.pathToBody ?? [];
    const inline = options.fields ?? {};
    const pathParams = placeholders(path);

    if (!METHODS.has(method)) {
      throw new SchemaError(`${name}: unsupported method ${method}`);
    }

    const stray = pathToBody.filter((param) => !pathParams.includes(param));
    if (stray.length > 0) {
      throw new SchemaError(`${name}: pathToBody names ${stray.join(', ')} missing from path ${path}`);
    }

    const declared = [...query.map(stripDollar), ...body, ...pathToBody];
    if (new Set(declared).size !== declared.length) {
      throw new SchemaError(
        `${name}: a field is named in more than one of query (${query.join(', ')}), body (${body.join(', ')}) ` +
          `and pathToBody (${pathToBody.join(', ')})`,
      );
    }

    const fields = new Map<string, FieldDescriptor>(kind?.schema.table.entries() ?? []);
    const shadowed = overlapping([...declared, ...Object.keys(inline)], new Set(fields.keys()));
    if (shadowed.length > 0) {
      throw new SchemaError(`${name}: ${shadowed.join(', ')} already declared by ${kind?.schema.kind}`);
    }

    const doubled = overlapping(body, new Set(Object.keys(inline)));
    if (doubled.length > 0) {
      throw new SchemaError(`${name}: ${doubled.join(', ')} declared both inline and in body`);
    }

    if (options.maxPageSize !== undefined && result.kind !== 'paginated') {
      throw new SchemaError(`${name}: maxPageSize given for a result that is not paginated`);
    }

    for (const [field, descriptor] of Object.entries(inline)) {
      fields.set(field, descriptor);
    }

    for (const field of declared) {
      if (!Object.hasOwn(inline, field)) {
        fields.set(field, registry.get(field));
      }
    }

    this.name = name;
    this.path = path;
    this.method = method;
    this.table = new AliasTable(name, fields);
    this.maxPageSize = options.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
    this.#pathParams = pathParams;
    this.#pathToBody = pathToBody;
    this.#query = query;
    this.#result = result;
    this.#shapeContext = { suppressKeys: options.suppressKeys ?? [] };
  }

  /** Whether the endpoint follows continuation links. */
  get paginated(): boolean {
    return this.#result.kind === 'paginated';
  }

  /**
   * Performs the operation.
   *
   * @returns `[null, result]`, or `[error, null]` where the error is an {@link ArgumentError}
   * for bad arguments, an {@link ApiError} for a failed response, or a wrapped transport or
   * shaping failure.
   */
  async call(session: HttpSession, args: CallArgs = {}): SafeWrapAsync<Error, T> {
    const [errPrepare, prepared] = safeWrap(() => this.#prepare(session, args));
    if (errPrepare) {
      return [errPrepare, null];
    }

    const { route, request, limit } = prepared;
    if (session.debug) {
      console.debug(`${this.name}: ${this.method.toUpperCase()} ${route}`, request.query ?? {});
    }

    const [errPayload, payload] = await this.#send(session, route, request);
    if (errPayload) {
      return [errPayload, null];
    }

    if (payload.missing) {
      return [null, payload.value];
    }

    if (this.#result.kind === 'none') {
      return this.#shape(undefined);
    }

    if (!this.paginated) {
      return this.#shape(payload.value);
    }

    return this.#collect(session, payload.value, limit, request);
  }

  #prepare(session: HttpSession, args: CallArgs): PreparedCall {
    const pathArgs = args.path ?? [];
    if (pathArgs.length !== this.#pathParams.length) {
      throw new ArgumentError(
        `${this.name} takes ${this.#pathParams.length} path argument(s) (${this.#pathParams.join(', ')}), got ${pathArgs.length}`,
      );
    }

    const bound = new Map(this.#pathParams.map((param, i) => [param, pathArgs[i]]));
    const input: Record<string, unknown> = { ...args.fields };
    for (const param of this.#pathToBody) {
      if (this.table.descriptor(param).find(param, input) === undefined) {
        input[param] = bound.get(param);
      }
    }

    const [errProcess, fields] = safeWrap(() => this.table.process(input));
    if (errProcess) {
      const unknownField = getUnknownFieldError(errProcess);
      throw unknownField
        ? new ArgumentError(`Name or alias "${unknownField.field}" not recognized by ${this.name}.`, { cause: errProcess })
        : errProcess;
    }

    const query: Record<string, string> = {};
    for (const wireName of this.#query) {
      const field = stripDollar(wireName);
      if (!Object.hasOwn(fields, field)) {
        continue;
      }

      const value = fields[field];
      delete fields[field];
      if (value !== null && value !== undefined) {
        query[wireName] = typeof value === 'string' ? value : JSON.stringify(value);
      }
    }

    const limit = this.#paginate(session, args, query);
    const route = this.path.replace(PLACEHOLDER, (_, param: string) => encodeURIComponent(String(bound.get(param))));
    const payload = args.data !== undefined ? args.data : fields;
    const body = this.method === 'get' || this.method === 'delete' ? undefined : JSON.stringify(payload);

    return { route, limit, request: { query, body, headers: JSON_HEADERS } };
  }

  /** Validates paging arguments and writes `$top`/`$skip`. Returns the record limit. */
  #paginate(session: HttpSession, { limit, skip, top }: CallArgs, query: Record<string, string>): number {
    if (!this.paginated) {
      for (const [arg, value] of Object.entries({ top, skip, limit })) {
        if (value !== undefined) {
          throw new ArgumentError(
            `${arg}=${value} given for ${this.name}, which is not paginated. Paging arguments only apply to paginated endpoints.`,
          );
        }
      }

      return 0;
    }

    if (top !== undefined) {
      throw new ArgumentError('$top is not supported, use limit instead.');
    }

    for (const [arg, value] of Object.entries({ limit, skip })) {
      if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
        throw new ArgumentError(`${arg} must be a non-negative integer, got ${value}`);
      }
    }

    const effectiveLimit = limit ?? session.defaultLimit;
    query.$top = String(Math.min(effectiveLimit, this.maxPageSize) || this.maxPageSize);
    query.$skip = String(skip ?? 0);
    return effectiveLimit;
  }

  /** Sends one request and checks the response for faults. */
  async #send(
    session: HttpSession,
    route: string,
    request: SessionRequest,
  ): SafeWrapAsync<Error, { missing: true; value: T } | { missing: false; value: unknown }> {
    const [errRequest, response] = await session[this.method](route, request);
    if (errRequest) {
      return [new Error(`error requesting ${this.name}`, { cause: errRequest }), null];
    }

    if (response.ok) {
      if (this.#result.kind === 'none') {
        return [null, { missing: false, value: undefined }];
      }

      const [errBody, body] = await getResponseData(response);
      if (errBody) {
        return [new Error(`error reading ${this.name} response`, { cause: errBody }), null];
      }

      return [null, { missing: false, value: body }];
    }

    const [errBody, body] = await getResponseData(response);
    const errors = errBody ? [] : this.#errorRecords(body, session);
    if (response.status === 404 && errors.length === 0 && this.#result.whenMissing) {
      return [null, { missing: true, value: this.#result.whenMissing() }];
    }

    return [new ApiError(errors, new HTTPError(response)), null];
  }

  #errorRecords(body: unknown, session: HttpSession): ApiErrorRecord[] {
    const [errValidate, fault] = validatorSync(body, faultBodySchema);
    if (errValidate) {
      if (session.debug) {
        console.debug(`${this.name}: error body carries no error records`, body);
      }

      return [];
    }

    return fault.errors.map((record) => ApiErrorRecord.fromMapping(record));
  }

  /** Follows continuation links until the limit is met or there are no more pages. */
  async #collect(session: HttpSession, first: unknown, limit: number, request: SessionRequest): SafeWrapAsync<Error, T> {
    const [errPage, page] = this.#page(first);
    if (errPage) {
      return [errPage, null];
    }

    const items = [...page.items];
    let next = page.nextPageLink;

    while ((!limit || items.length < limit) && next) {
      const remaining = limit - items.length;
      if (remaining > 0 && remaining < this.maxPageSize) {
        next = next.replace(TOP_PARAM, (_, marker: string) => `${marker}top=${remaining}`);
      }

      if (session.debug) {
        console.debug(`${this.name}: ${items.length} items so far, following ${next}`);
      }

      const [errPayload, payload] = await this.#send(session, next, { body: request.body, headers: request.headers });
      if (errPayload) {
        return [errPayload, null];
      }

      const [errNext, nextPage] = this.#page(payload.value);
      if (errNext) {
        return [errNext, null];
      }

      items.push(...nextPage.items);
      next = nextPage.nextPageLink;
    }

    return this.#shape(limit > 0 ? items.slice(0, limit) : items);
  }

  #page(payload: unknown): SafeWrap<Error, z.infer<typeof pageSchema>> {
    const [errValidate, page] = validatorSync(payload, pageSchema);
    if (errValidate) {
      return [new Error(`error reading ${this.name} page`, { cause: errValidate }), null];
    }

    return [null, page];
  }

  #shape(payload: unknown): SafeWrap<Error, T> {
    const [errShape, value] = safeWrap(() => this.#result.shape(payload, this.#shapeContext));
    if (errShape) {
      return [new Error(`error shaping ${this.name} result`, { cause: errShape }), null];
    }

    return [null, value];
  }
}

/** Declares an endpoint. See {@link Endpoint}. */
export function defineEndpoint<T>(options: EndpointOptions<T>): Endpoint<T> {
  return new Endpoint(options);
}
