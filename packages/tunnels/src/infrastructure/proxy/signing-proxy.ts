/**
 * @file signing-proxy.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Local HTTP/1.1 listener that forwards every request to an API Gateway host,
 * signed with SigV4 for the execute-api service, and streams the response back.
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { Pool, type Dispatcher } from 'undici';
import { SignatureV4 } from '@smithy/signature-v4';
import { HttpRequest } from '@smithy/protocol-http';
import { Sha256 } from '@aws-crypto/sha256-js';
import type { AwsCredentialIdentityProvider } from '@smithy/types';
import type { Logger } from 'pino';
import { PORT_RANGE, PROXY_CONFIG } from '../../config/constants.js';
import { SigningError, UpstreamError, describeError } from '../../domain/errors/domain-errors.js';
import {
  buildUpstreamHeaders,
  filterResponseHeaders,
  parseQuery,
  rewriteTarget,
} from './request-rewrite.js';

const PROXIED_METHODS = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
] as const satisfies readonly Dispatcher.HttpMethod[];

type ProxiedMethod = (typeof PROXIED_METHODS)[number];

const PROXIED_METHOD_SET: ReadonlySet<string> = new Set(PROXIED_METHODS);

const BODYLESS_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

function isProxiedMethod(method: string): method is ProxiedMethod {
  return PROXIED_METHOD_SET.has(method);
}

/**
 * Where signed requests go.
 */
export interface UpstreamTarget {
  /** Origin TCP connections are opened to, e.g. `https://127.0.0.1:14001` */
  origin: string;
  /** Host header value and signing host */
  host: string;
  /** TLS server name and certificate identity; defaults to the origin host */
  servername?: string;
  /** Extra trusted CA certificates (PEM) */
  ca?: string | string[];
}

export interface SigningProxyConfig {
  port: number;
  listenHost?: string;
  upstream: UpstreamTarget;
  /** Stage prefix such as `/prod`, or '' */
  pathPrefix: string;
  region: string;
  credentials: AwsCredentialIdentityProvider;
  /** Private REST APIs are selected through the x-apigw-api-id header */
  apiId?: string;
  requestTimeoutMs?: number;
  logger: Logger;
}

/**
 * SigV4 signing reverse proxy bound to one tunnel.
 */
export class SigningProxy {
  private readonly port: number;
  private readonly listenHost: string;
  private readonly upstream: UpstreamTarget;
  private readonly pathPrefix: string;
  private readonly apiId: string | undefined;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly signer: SignatureV4;
  private readonly pool: Pool;
  private readonly app: FastifyInstance;
  private readonly inFlight = new Set<AbortController>();
  private closing: Promise<void> | null = null;

  constructor(config: SigningProxyConfig) {
    this.port = config.port;
    this.listenHost = config.listenHost ?? PORT_RANGE.HOST;
    this.upstream = config.upstream;
    this.pathPrefix = config.pathPrefix;
    this.apiId = config.apiId;
    this.requestTimeoutMs = config.requestTimeoutMs ?? PROXY_CONFIG.REQUEST_TIMEOUT_MS;
    this.logger = config.logger.child({ component: 'SigningProxy', localPort: config.port });

    this.signer = new SignatureV4({
      credentials: config.credentials,
      region: config.region,
      service: PROXY_CONFIG.SIGNING_SERVICE,
      sha256: Sha256,
    });

    this.pool = new Pool(config.upstream.origin, {
      connections: PROXY_CONFIG.POOL_MAX_CONNECTIONS,
      keepAliveTimeout: PROXY_CONFIG.POOL_IDLE_TIMEOUT_MS,
      keepAliveMaxTimeout: PROXY_CONFIG.POOL_IDLE_TIMEOUT_MS,
      connect: {
        servername: config.upstream.servername ?? new URL(config.upstream.origin).hostname,
        rejectUnauthorized: true,
        ...(config.upstream.ca !== undefined && { ca: config.upstream.ca }),
      },
    });

    this.app = this.createServer();
  }

  get localPort(): number {
    return this.port;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  /**
   * Binds the listener. Rejects with the listen error (EADDRINUSE included).
   */
  async start(): Promise<void> {
    await this.app.listen({ port: this.port, host: this.listenHost });
    this.logger.debug({ upstream: this.upstream.origin, host: this.upstream.host }, 'Signing proxy listening');
  }

  /**
   * Closes the listener, cancels in-flight requests and drops pooled connections.
   */
  stop(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    for (const controller of this.inFlight) {
      controller.abort(new Error('tunnel stopped'));
    }
    this.inFlight.clear();
    await this.app.close();
    await this.pool.destroy();
    this.logger.debug('Signing proxy stopped');
  }

  private createServer(): FastifyInstance {
    const app = Fastify({
      logger: false,
      exposeHeadRoutes: false,
      forceCloseConnections: true,
      bodyLimit: PROXY_CONFIG.BODY_LIMIT_BYTES,
      requestTimeout: 0,
      routerOptions: { maxParamLength: 8_192 },
    });

    // Bodies are forwarded byte-for-byte whatever their type
    app.removeAllContentTypeParsers();
    app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    app.route({
      method: [...PROXIED_METHODS],
      url: '/*',
      handler: (request, reply) => this.forward(request, reply),
    });

    // Every path is routed, so only other methods end up here
    app.setNotFoundHandler((request, reply) => this.rejectMethod(request.method, reply));

    return app;
  }

  private async forward(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    const method = request.method;
    if (!isProxiedMethod(method)) {
      return this.rejectMethod(method, reply);
    }

    const { path, query } = rewriteTarget(request.url, this.pathPrefix);
    const body = Buffer.isBuffer(request.body) ? request.body : undefined;
    // GET and HEAD bodies are never read, so their framing is not forwarded
    const hadBody =
      body !== undefined ||
      (!BODYLESS_METHODS.has(method) &&
        (request.headers['content-length'] !== undefined ||
          request.headers['transfer-encoding'] !== undefined));
    const headers = buildUpstreamHeaders(request.headers, {
      host: this.upstream.host,
      bodyLength: body?.length ?? 0,
      hadBody,
      ...(this.apiId !== undefined && { apiId: this.apiId }),
    });

    let signedHeaders: Record<string, string>;
    try {
      signedHeaders = await this.sign(method, path, query, headers, body);
    } catch (error) {
      const failure = new SigningError(describeError(error));
      this.logger.error({ error, method, path }, 'Failed to sign request');
      return reply.code(failure.statusCode).type('text/plain; charset=utf-8').send(failure.message);
    }

    const controller = new AbortController();
    this.inFlight.add(controller);
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort(new Error('client closed the connection'));
      }
      this.inFlight.delete(controller);
    });

    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const signal = AbortSignal.any([controller.signal, timeout]);

    try {
      const response = await this.pool.request({
        method,
        path: query === '' ? path : `${path}?${query}`,
        headers: signedHeaders,
        body: body && body.length > 0 ? body : null,
        signal,
      });

      reply.code(response.statusCode);
      reply.headers(filterResponseHeaders(response.headers));
      return reply.send(response.body);
    } catch (error) {
      const cause = timeout.aborted
        ? `no response within ${this.requestTimeoutMs}ms`
        : describeError(error);
      const failure = new UpstreamError(cause);
      this.logger.error({ error, method, path, upstream: this.upstream.origin }, 'Upstream request failed');
      return reply.code(failure.statusCode).type('text/plain; charset=utf-8').send(failure.message);
    }
  }

  private rejectMethod(method: string, reply: FastifyReply): FastifyReply {
    return reply
      .code(405)
      .header('allow', PROXIED_METHODS.join(', '))
      .type('text/plain; charset=utf-8')
      .send(`Method not allowed: ${method}`);
  }

  private async sign(
    method: ProxiedMethod,
    path: string,
    query: string,
    headers: Record<string, string>,
    body: Buffer | undefined
  ): Promise<Record<string, string>> {
    const request = new HttpRequest({
      method,
      protocol: 'https:',
      hostname: this.upstream.host,
      path,
      query: parseQuery(query),
      headers,
      ...(body && body.length > 0 && { body }),
    });
    const signed = await this.signer.sign(request);
    return signed.headers;
  }
}
