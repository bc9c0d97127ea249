/**
 * @file aws-cloud-client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * AWS SDK v3 facade: topology lookups for private gateways and the target
 * lookups the CLI needs before starting a tunnel.
 */

import {
  DescribeInstancesCommand,
  DescribeVpcEndpointsCommand,
  EC2Client,
  type VpcEndpoint as Ec2VpcEndpoint,
} from '@aws-sdk/client-ec2';
import { DescribeInstanceInformationCommand, SSMClient } from '@aws-sdk/client-ssm';
import { DescribeTasksCommand, ECSClient, ListTasksCommand } from '@aws-sdk/client-ecs';
import { APIGatewayClient, GetRestApiCommand } from '@aws-sdk/client-api-gateway';
import { ApiGatewayV2Client, GetApiCommand } from '@aws-sdk/client-apigatewayv2';
import type { AwsCredentialIdentityProvider } from '@smithy/types';
import type { Logger } from 'pino';
import type { TopologyCloudApi } from '../../domain/ports/topology-cloud-api.js';
import type { JumpHost, VpcEndpoint } from '../../domain/value-objects/topology.js';
import type { ApiTarget } from '../../domain/value-objects/api-target.js';
import type { EcsTarget } from '../../domain/entities/ecs-tunnel.js';
import { TargetNotFoundError } from '../../domain/errors/domain-errors.js';
import {
  chunk,
  isExecuteApiEndpoint,
  taskIdFromArn,
  toJumpHost,
  toRestEndpointType,
  toVpcEndpoint,
} from './mappers.js';

/** DescribeInstances accepts at most this many ids per call */
const DESCRIBE_INSTANCES_BATCH = 100;

export interface AwsCloudClientDeps {
  region: string;
  credentials: AwsCredentialIdentityProvider;
  logger: Logger;
}

export class AwsCloudClient implements TopologyCloudApi {
  private readonly ec2: EC2Client;
  private readonly ssm: SSMClient;
  private readonly ecs: ECSClient;
  private readonly apiGateway: APIGatewayClient;
  private readonly apiGatewayV2: ApiGatewayV2Client;
  private readonly logger: Logger;

  constructor(deps: AwsCloudClientDeps) {
    const clientConfig = { region: deps.region, credentials: deps.credentials };
    this.ec2 = new EC2Client(clientConfig);
    this.ssm = new SSMClient(clientConfig);
    this.ecs = new ECSClient(clientConfig);
    this.apiGateway = new APIGatewayClient(clientConfig);
    this.apiGatewayV2 = new ApiGatewayV2Client(clientConfig);
    this.logger = deps.logger.child({ component: 'AwsCloudClient' });
  }

  async listExecuteApiVpcEndpoints(signal?: AbortSignal): Promise<Map<string, VpcEndpoint>> {
    const index = new Map<string, VpcEndpoint>();
    let nextToken: string | undefined;

    do {
      const page = await this.ec2.send(
        new DescribeVpcEndpointsCommand({ NextToken: nextToken }),
        { abortSignal: signal }
      );
      for (const endpoint of page.VpcEndpoints ?? []) {
        if (!isExecuteApiEndpoint(endpoint)) continue;
        const mapped = toVpcEndpoint(endpoint);
        // First endpoint per VPC wins, matching EC2's listing order
        if (!index.has(mapped.vpcId)) {
          index.set(mapped.vpcId, mapped);
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);

    this.logger.debug({ vpcs: [...index.keys()] }, 'Listed execute-api VPC endpoints');
    return index;
  }

  async listSsmManagedInstances(signal?: AbortSignal): Promise<JumpHost[]> {
    const online: string[] = [];
    let nextToken: string | undefined;

    do {
      const page = await this.ssm.send(
        new DescribeInstanceInformationCommand({ NextToken: nextToken }),
        { abortSignal: signal }
      );
      for (const info of page.InstanceInformationList ?? []) {
        if (info.InstanceId && info.PingStatus === 'Online') {
          online.push(info.InstanceId);
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);

    const hosts: JumpHost[] = [];
    for (const batch of chunk(online, DESCRIBE_INSTANCES_BATCH)) {
      const output = await this.ec2.send(new DescribeInstancesCommand({ InstanceIds: batch }), {
        abortSignal: signal,
      });
      for (const reservation of output.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          hosts.push(toJumpHost(instance, true));
        }
      }
    }

    this.logger.debug({ count: hosts.length }, 'Listed SSM managed instances');
    return hosts;
  }

  async describeVpcEndpoint(endpointId: string, signal?: AbortSignal): Promise<VpcEndpoint> {
    const output = await this.ec2.send(
      new DescribeVpcEndpointsCommand({ VpcEndpointIds: [endpointId] }),
      { abortSignal: signal }
    );
    const endpoint: Ec2VpcEndpoint | undefined = output.VpcEndpoints?.[0];
    if (!endpoint) {
      throw new TargetNotFoundError(`VPC endpoint not found: ${endpointId}`);
    }
    return toVpcEndpoint(endpoint);
  }

  /**
   * First running task of a service and the container to forward to.
   */
  async resolveEcsTarget(
    cluster: string,
    serviceName: string,
    containerName?: string,
    signal?: AbortSignal
  ): Promise<EcsTarget> {
    const listed = await this.ecs.send(
      new ListTasksCommand({ cluster, serviceName, desiredStatus: 'RUNNING' }),
      { abortSignal: signal }
    );
    const taskArns = listed.taskArns ?? [];
    if (taskArns.length === 0) {
      throw new TargetNotFoundError(`No running tasks for service ${serviceName} in ${cluster}`);
    }

    const described = await this.ecs.send(new DescribeTasksCommand({ cluster, tasks: taskArns }), {
      abortSignal: signal,
    });

    for (const task of described.tasks ?? []) {
      const container = (task.containers ?? []).find(
        (candidate) =>
          candidate.runtimeId !== undefined &&
          (containerName === undefined || candidate.name === containerName)
      );
      if (task.taskArn && task.clusterArn && container?.runtimeId && container.name) {
        return {
          serviceName,
          clusterArn: task.clusterArn,
          taskId: taskIdFromArn(task.taskArn),
          containerName: container.name,
          containerRuntimeId: container.runtimeId,
        };
      }
    }

    throw new TargetNotFoundError(
      containerName
        ? `No running container named ${containerName} in service ${serviceName}`
        : `No running container with a runtime id in service ${serviceName}`
    );
  }

  /**
   * Looks the id up as a REST API first and as an HTTP API otherwise.
   */
  async resolveApiTarget(apiId: string, signal?: AbortSignal): Promise<ApiTarget> {
    try {
      const rest = await this.apiGateway.send(new GetRestApiCommand({ restApiId: apiId }), {
        abortSignal: signal,
      });
      return {
        kind: 'rest',
        apiId,
        name: rest.name ?? apiId,
        endpointType: toRestEndpointType(rest.endpointConfiguration?.types),
      };
    } catch (error) {
      if (!(error instanceof Error) || error.name !== 'NotFoundException') {
        throw error;
      }
    }

    const http = await this.apiGatewayV2.send(new GetApiCommand({ ApiId: apiId }), {
      abortSignal: signal,
    });
    if (!http.ApiEndpoint) {
      throw new TargetNotFoundError(`API ${apiId} has no invoke endpoint`);
    }
    return {
      kind: 'http',
      apiId,
      name: http.Name ?? apiId,
      apiEndpoint: http.ApiEndpoint,
    };
  }

  destroy(): void {
    this.ec2.destroy();
    this.ssm.destroy();
    this.ecs.destroy();
    this.apiGateway.destroy();
    this.apiGatewayV2.destroy();
  }
}
