/**
 * @file api-target.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type RestEndpointType = 'REGIONAL' | 'EDGE' | 'PRIVATE';

/**
 * API Gateway v1 (REST) API.
 */
export interface RestApiTarget {
  readonly kind: 'rest';
  readonly apiId: string;
  readonly name: string;
  readonly endpointType: RestEndpointType;
}

/**
 * API Gateway v2 (HTTP) API.
 */
export interface HttpApiTarget {
  readonly kind: 'http';
  readonly apiId: string;
  readonly name: string;
  /** Default invoke endpoint, e.g. `https://abc123.execute-api.eu-west-1.amazonaws.com` */
  readonly apiEndpoint: string;
}

export type ApiTarget = RestApiTarget | HttpApiTarget;

/** HTTP API stage that is served without a path prefix */
export const DEFAULT_HTTP_STAGE = '$default';

/**
 * Hostname requests for this API are addressed to.
 */
export function upstreamHost(api: ApiTarget, region: string): string {
  switch (api.kind) {
    case 'rest':
      return `${api.apiId}.execute-api.${region}.amazonaws.com`;
    case 'http':
      return new URL(api.apiEndpoint).hostname;
  }
}

/**
 * Path prefix prepended to every proxied request, or '' when the stage has none.
 */
export function stagePathPrefix(api: ApiTarget, stage: string): string {
  if (api.kind === 'http' && stage === DEFAULT_HTTP_STAGE) {
    return '';
  }
  return `/${stage}`;
}

export function isPrivateApi(api: ApiTarget): boolean {
  return api.kind === 'rest' && api.endpointType === 'PRIVATE';
}

export function apiTypeLabel(api: ApiTarget): 'REST' | 'HTTP' {
  return api.kind === 'rest' ? 'REST' : 'HTTP';
}

export function endpointTypeOf(api: ApiTarget): RestEndpointType {
  // HTTP APIs are always regional
  return api.kind === 'rest' ? api.endpointType : 'REGIONAL';
}

/**
 * Public invoke URL of a stage, as API Gateway prints it.
 */
export function invokeUrl(api: ApiTarget, stage: string, region: string): string {
  return `https://${upstreamHost(api, region)}${stagePathPrefix(api, stage)}/`;
}
