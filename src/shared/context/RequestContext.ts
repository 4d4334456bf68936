/**
 * RequestContext - the per-request façade handed to every handler
 *
 * Bundles the Fastify request, the reply and a request-scoped logger, and
 * exposes response operations that never throw for expected failures: they
 * return an AppError (or undefined) so handlers can end with
 * `return ctx.emitJSON(data);`.
 *
 * A context writes at most one response. The first response-writing call
 * commits it; a second one is a programming error and throws
 * ResponseAlreadySentError.
 *
 * The active context is also kept in AsyncLocalStorage for code deep in
 * the call stack:
 *   const ctx = RequestContext.current();
 *
 * @see https://nodejs.org/api/async_context.html
 */
import { AsyncLocalStorage } from 'async_hooks';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import type { RequestMetadata } from '../../domain/ports/INotifier.js';
import type { ITemplateRenderer } from '../../domain/ports/ITemplateRenderer.js';
import type { Logger } from '../../infra/logger/logger.js';
import { LoggerFactory } from '../../infra/logger/logger.js';
import type { AppError } from '../errors/AppError.js';
import { classify } from '../errors/classify.js';
import type { DecodeResult, FormOutput, FormValues } from '../forms/formDecoder.js';
import { decodeForm, decodeJson } from '../forms/formDecoder.js';

// ============================================
// ERRORS
// ============================================

/**
 * Thrown when a second response-writing operation is attempted
 */
export class ResponseAlreadySentError extends Error {
  constructor(
    public readonly operation: string,
    public readonly committedBy: string
  ) {
    super(`Cannot ${operation}: response already sent by ${committedBy}`);
    this.name = 'ResponseAlreadySentError';
  }
}

// ============================================
// TYPES
// ============================================

export interface RequestContextOptions {
  renderer: ITemplateRenderer;
  log?: Logger;
}

// ============================================
// ASYNC LOCAL STORAGE INSTANCE
// ============================================

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

// ============================================
// REQUEST CONTEXT
// ============================================

export class RequestContext {
  readonly request: FastifyRequest;
  readonly reply: FastifyReply;
  readonly log: Logger;

  /** Classified error being recovered, set before an override handler runs */
  failure?: AppError;

  private readonly renderer: ITemplateRenderer;
  private committedBy: string | null = null;

  constructor(request: FastifyRequest, reply: FastifyReply, options: RequestContextOptions) {
    this.request = request;
    this.reply = reply;
    this.renderer = options.renderer;
    this.log =
      options.log ?? LoggerFactory.createRequestLogger(this.requestId, this.correlationId);
  }

  /**
   * Run a function with this context as the current one
   */
  static run<T>(ctx: RequestContext, fn: () => T): T {
    return asyncLocalStorage.run(ctx, fn);
  }

  /**
   * Get the current request context (or undefined outside a request)
   */
  static current(): RequestContext | undefined {
    return asyncLocalStorage.getStore();
  }

  // ============================================
  // ACCESSORS
  // ============================================

  get requestId(): string {
    return this.request.requestId ?? this.request.id;
  }

  get correlationId(): string {
    return this.request.correlationId ?? this.requestId;
  }

  get method(): string {
    return this.request.method;
  }

  /**
   * Path including the query string, if any
   */
  get path(): string {
    return this.request.url;
  }

  isPost(): boolean {
    return this.method === 'POST';
  }

  header(name: string): string | undefined {
    const value = this.request.headers[name.toLowerCase()];
    return Array.isArray(value) ? value.join(', ') : value;
  }

  /**
   * Whether a response has already been written for this request
   */
  get committed(): boolean {
    return this.committedBy !== null || this.reply.sent;
  }

  metadata(): RequestMetadata {
    return {
      requestId: this.requestId,
      correlationId: this.correlationId,
      method: this.method,
      url: this.path,
      ip: this.request.ip,
      userAgent: this.header('user-agent'),
    };
  }

  // ============================================
  // RESPONSE OPERATIONS
  // ============================================

  /**
   * Redirect with 302 (or 301 when permanent). Always returns undefined.
   *
   * @example
   * return ctx.redirect('/login');
   */
  redirect(path: string, permanent = false): undefined {
    this.commit('redirect');
    void this.reply.code(permanent ? 301 : 302).header('location', path).send();
    return undefined;
  }

  /**
   * Render templates and send the result as HTML. A render failure is
   * returned classified and nothing is written.
   */
  async renderTemplate(names: readonly string[], data: unknown): Promise<AppError | undefined> {
    this.assertWritable('renderTemplate');

    let html: string;
    try {
      html = await this.renderer.render(names, data);
    } catch (error) {
      return classify(error);
    }

    this.commit('renderTemplate');
    void this.reply.type('text/html; charset=utf-8').send(html);
    return undefined;
  }

  /**
   * Send `data` as JSON. A serialization failure (circular structure,
   * BigInt) is returned classified and nothing is written.
   */
  emitJSON(data: unknown): AppError | undefined {
    this.assertWritable('emitJSON');

    let payload: string;
    try {
      payload = JSON.stringify(data) ?? 'null';
    } catch (error) {
      return classify(error);
    }

    this.commit('emitJSON');
    void this.reply.type('application/json; charset=utf-8').send(payload);
    return undefined;
  }

  /**
   * Minimal status-only response, no body
   */
  writeStatus(statusCode: number): void {
    this.commit('writeStatus');
    void this.reply.code(statusCode).send();
  }

  // ============================================
  // INPUT DECODING
  // ============================================

  /**
   * Decode query string and url-encoded body values (body wins on
   * conflicts). Unknown fields are ignored.
   *
   * @example
   * const { data, error } = ctx.loadFormData(signupSchema);
   * if (error) return error;
   */
  loadFormData<Shape extends z.ZodRawShape>(
    schema: z.ZodObject<Shape>
  ): DecodeResult<FormOutput<Shape>> {
    return decodeForm({ ...toValues(this.request.query), ...toValues(this.request.body) }, schema);
  }

  /**
   * Validate the JSON body against a schema
   */
  loadJSONBody<T>(schema: z.ZodType<T>): DecodeResult<T> {
    return decodeJson(this.request.body, schema);
  }

  // ============================================
  // WRITE-ONCE GUARD
  // ============================================

  private assertWritable(operation: string): void {
    if (this.committedBy !== null) {
      throw new ResponseAlreadySentError(operation, this.committedBy);
    }
    if (this.reply.sent) {
      throw new ResponseAlreadySentError(operation, 'the reply');
    }
  }

  private commit(operation: string): void {
    this.assertWritable(operation);
    this.committedBy = operation;
  }
}

function toValues(source: unknown): FormValues {
  if (typeof source !== 'object' || source === null || Array.isArray(source)) {
    return {};
  }
  return { ...source };
}

export default RequestContext;
