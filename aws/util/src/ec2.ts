import { parse } from "@aws-sdk/util-arn-parser";
import {
  AwsAmiId,
  AwsCustomerGatewayId,
  AwsElasticIpId,
  AwsInstanceId,
  AwsInternetGatewayId,
  AwsKeyPairId,
  AwsNatGatewayId,
  AwsNetworkAclId,
  AwsNetworkInterfaceId,
  AwsRouteTableId,
  AwsSecurityGroupId,
  AwsSnapshotId,
  AwsSubnetId,
  AwsTransitGatewayAttachmentId,
  AwsTransitGatewayId,
  AwsVolumeId,
  AwsVpcId,
  AwsVpnConnectionId,
  AwsVpnGatewayId,
  ResourceId,
  ResourceIdType,
} from "@awsid/resource-id";

/**
 * Resource types of EC2 ARNs, `arn:aws:ec2:<region>:<account>:<type>/<id>`
 */
export const ec2ResourceTypes: ReadonlyMap<string, ResourceIdType> = new Map<
  string,
  ResourceIdType
>([
  ["customer-gateway", AwsCustomerGatewayId],
  ["elastic-ip", AwsElasticIpId],
  ["image", AwsAmiId],
  ["instance", AwsInstanceId],
  ["internet-gateway", AwsInternetGatewayId],
  ["key-pair", AwsKeyPairId],
  ["natgateway", AwsNatGatewayId],
  ["network-acl", AwsNetworkAclId],
  ["network-interface", AwsNetworkInterfaceId],
  ["route-table", AwsRouteTableId],
  ["security-group", AwsSecurityGroupId],
  ["snapshot", AwsSnapshotId],
  ["subnet", AwsSubnetId],
  ["transit-gateway", AwsTransitGatewayId],
  ["transit-gateway-attachment", AwsTransitGatewayAttachmentId],
  ["volume", AwsVolumeId],
  ["vpc", AwsVpcId],
  ["vpn-connection", AwsVpnConnectionId],
  ["vpn-gateway", AwsVpnGatewayId],
]);

export function resourceSegmentRead<N extends string, P extends string>(
  resource: string,
  resourceType: string,
  type: ResourceIdType<N, P>,
): ResourceId<N, P> {
  const prefix = `${resourceType}/`;
  if (!resource.startsWith(prefix)) {
    throw new Error(`Invalid ${resourceType} resource: ${resource}`);
  }
  const result = type.parse(resource.slice(prefix.length));
  if (!result.ok) {
    throw new Error(`Invalid ${resourceType} resource: ${resource}`, {
      cause: result.error,
    });
  }
  return result.value;
}

export function resourceSegmentWrite(
  resourceType: string,
  id: ResourceId,
): string {
  return `${resourceType}/${id}`;
}

/**
 * Typed ID of an EC2 ARN. Checks shape only.
 */
export function ec2ArnResourceIdRead(arn: string): ResourceId {
  const { resource, service } = parse(arn);
  if (service !== "ec2") {
    throw new Error(`Invalid EC2 ARN: ${arn}`);
  }
  const [resourceType] = resource.split("/", 1);
  const type = ec2ResourceTypes.get(resourceType);
  if (!type) {
    throw new Error(`Unknown EC2 resource type: ${resourceType}`);
  }
  return resourceSegmentRead(resource, resourceType, type);
}

export function instanceResourceRead(resource: string): {
  instanceId: AwsInstanceId;
} {
  return {
    instanceId: resourceSegmentRead(resource, "instance", AwsInstanceId),
  };
}

export function instanceResourceWrite({
  instanceId,
}: {
  instanceId: AwsInstanceId;
}) {
  return resourceSegmentWrite("instance", instanceId);
}

export function securityGroupResourceRead(resource: string): {
  securityGroupId: AwsSecurityGroupId;
} {
  return {
    securityGroupId: resourceSegmentRead(
      resource,
      "security-group",
      AwsSecurityGroupId,
    ),
  };
}

export function subnetResourceRead(resource: string): {
  subnetId: AwsSubnetId;
} {
  return { subnetId: resourceSegmentRead(resource, "subnet", AwsSubnetId) };
}

export function volumeResourceRead(resource: string): {
  volumeId: AwsVolumeId;
} {
  return { volumeId: resourceSegmentRead(resource, "volume", AwsVolumeId) };
}

export function vpcResourceRead(resource: string): { vpcId: AwsVpcId } {
  return { vpcId: resourceSegmentRead(resource, "vpc", AwsVpcId) };
}
