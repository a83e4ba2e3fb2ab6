/**
 * AWS resource IDs in the general format: a prefix specific to the resource
 * type (e.g. `ami-`) followed by 8 or 17 lowercase hexadecimal characters.
 *
 * Resources created before January 2016 have 8 character IDs, newer ones 17
 * (https://docs.aws.amazon.com/AWSEC2/latest/UserGuide/resource-ids.html).
 * Every type accepts both.
 */
import {
  ResourceId,
  ResourceIdOf,
  ResourceIdType,
  resourceIdType,
} from "./resource-id";

export const AwsNetworkAclId = resourceIdType(
  "AwsNetworkAclId",
  "acl-",
  "AWS Network ACL (Access Control List) ID",
);
export type AwsNetworkAclId = ResourceIdOf<typeof AwsNetworkAclId>;

export const AwsAmiId = resourceIdType(
  "AwsAmiId",
  "ami-",
  "AWS AMI (Amazon Machine Image) ID",
);
export type AwsAmiId = ResourceIdOf<typeof AwsAmiId>;

export const AwsCustomerGatewayId = resourceIdType(
  "AwsCustomerGatewayId",
  "cgw-",
  "AWS Customer Gateway ID",
);
export type AwsCustomerGatewayId = ResourceIdOf<typeof AwsCustomerGatewayId>;

export const AwsElasticIpId = resourceIdType(
  "AwsElasticIpId",
  "eipalloc-",
  "AWS Elastic IP ID",
);
export type AwsElasticIpId = ResourceIdOf<typeof AwsElasticIpId>;

export const AwsEfsFileSystemId = resourceIdType(
  "AwsEfsFileSystemId",
  "fs-",
  "AWS EFS (Elastic File System) ID",
);
export type AwsEfsFileSystemId = ResourceIdOf<typeof AwsEfsFileSystemId>;

export const AwsEfsMountTargetId = resourceIdType(
  "AwsEfsMountTargetId",
  "fsmt-",
  "AWS EFS Mount Target ID",
);
export type AwsEfsMountTargetId = ResourceIdOf<typeof AwsEfsMountTargetId>;

export const AwsCloudFormationStackId = resourceIdType(
  "AwsCloudFormationStackId",
  "stack-",
  "AWS CloudFormation Stack ID",
);
export type AwsCloudFormationStackId = ResourceIdOf<
  typeof AwsCloudFormationStackId
>;

export const AwsElasticBeanstalkEnvironmentId = resourceIdType(
  "AwsElasticBeanstalkEnvironmentId",
  "e-",
  "AWS Elastic Beanstalk Environment ID",
);
export type AwsElasticBeanstalkEnvironmentId = ResourceIdOf<
  typeof AwsElasticBeanstalkEnvironmentId
>;

export const AwsInstanceId = resourceIdType(
  "AwsInstanceId",
  "i-",
  "AWS EC2 Instance ID",
);
export type AwsInstanceId = ResourceIdOf<typeof AwsInstanceId>;

export const AwsInternetGatewayId = resourceIdType(
  "AwsInternetGatewayId",
  "igw-",
  "AWS Internet Gateway ID",
);
export type AwsInternetGatewayId = ResourceIdOf<typeof AwsInternetGatewayId>;

export const AwsKeyPairId = resourceIdType(
  "AwsKeyPairId",
  "key-",
  "AWS Key Pair ID",
);
export type AwsKeyPairId = ResourceIdOf<typeof AwsKeyPairId>;

export const AwsLoadBalancerId = resourceIdType(
  "AwsLoadBalancerId",
  "elbv2-",
  "AWS Elastic Load Balancer ID",
);
export type AwsLoadBalancerId = ResourceIdOf<typeof AwsLoadBalancerId>;

export const AwsNatGatewayId = resourceIdType(
  "AwsNatGatewayId",
  "nat-",
  "AWS NAT Gateway ID",
);
export type AwsNatGatewayId = ResourceIdOf<typeof AwsNatGatewayId>;

export const AwsNetworkInterfaceId = resourceIdType(
  "AwsNetworkInterfaceId",
  "eni-",
  "AWS Network Interface ID",
);
export type AwsNetworkInterfaceId = ResourceIdOf<typeof AwsNetworkInterfaceId>;

export const AwsPlacementGroupId = resourceIdType(
  "AwsPlacementGroupId",
  "pg-",
  "AWS Placement Group ID",
);
export type AwsPlacementGroupId = ResourceIdOf<typeof AwsPlacementGroupId>;

export const AwsRdsInstanceId = resourceIdType(
  "AwsRdsInstanceId",
  "db-",
  "AWS RDS Instance ID",
);
export type AwsRdsInstanceId = ResourceIdOf<typeof AwsRdsInstanceId>;

export const AwsRedshiftClusterId = resourceIdType(
  "AwsRedshiftClusterId",
  "redshift-",
  "AWS Redshift Cluster ID",
);
export type AwsRedshiftClusterId = ResourceIdOf<typeof AwsRedshiftClusterId>;

export const AwsRouteTableId = resourceIdType(
  "AwsRouteTableId",
  "rtb-",
  "AWS Route Table ID",
);
export type AwsRouteTableId = ResourceIdOf<typeof AwsRouteTableId>;

export const AwsSecurityGroupId = resourceIdType(
  "AwsSecurityGroupId",
  "sg-",
  "AWS Security Group ID",
);
export type AwsSecurityGroupId = ResourceIdOf<typeof AwsSecurityGroupId>;

export const AwsSnapshotId = resourceIdType(
  "AwsSnapshotId",
  "snap-",
  "AWS EBS Snapshot ID",
);
export type AwsSnapshotId = ResourceIdOf<typeof AwsSnapshotId>;

export const AwsSubnetId = resourceIdType(
  "AwsSubnetId",
  "subnet-",
  "AWS VPC Subnet ID",
);
export type AwsSubnetId = ResourceIdOf<typeof AwsSubnetId>;

export const AwsTargetGroupId = resourceIdType(
  "AwsTargetGroupId",
  "tg-",
  "AWS Target Group ID",
);
export type AwsTargetGroupId = ResourceIdOf<typeof AwsTargetGroupId>;

export const AwsTransitGatewayAttachmentId = resourceIdType(
  "AwsTransitGatewayAttachmentId",
  "tgw-attach-",
  "AWS Transit Gateway Attachment ID",
);
export type AwsTransitGatewayAttachmentId = ResourceIdOf<
  typeof AwsTransitGatewayAttachmentId
>;

export const AwsTransitGatewayId = resourceIdType(
  "AwsTransitGatewayId",
  "tgw-",
  "AWS Transit Gateway ID",
);
export type AwsTransitGatewayId = ResourceIdOf<typeof AwsTransitGatewayId>;

export const AwsVolumeId = resourceIdType(
  "AwsVolumeId",
  "vol-",
  "AWS EBS Volume ID",
);
export type AwsVolumeId = ResourceIdOf<typeof AwsVolumeId>;

export const AwsVpcId = resourceIdType(
  "AwsVpcId",
  "vpc-",
  "AWS VPC (Virtual Private Cloud) ID",
);
export type AwsVpcId = ResourceIdOf<typeof AwsVpcId>;

export const AwsVpnConnectionId = resourceIdType(
  "AwsVpnConnectionId",
  "vpn-",
  "AWS VPN Connection ID",
);
export type AwsVpnConnectionId = ResourceIdOf<typeof AwsVpnConnectionId>;

export const AwsVpnGatewayId = resourceIdType(
  "AwsVpnGatewayId",
  "vgw-",
  "AWS VPN Gateway ID",
);
export type AwsVpnGatewayId = ResourceIdOf<typeof AwsVpnGatewayId>;

export const generalResourceIdTypes: readonly ResourceIdType[] = [
  AwsNetworkAclId,
  AwsAmiId,
  AwsCustomerGatewayId,
  AwsElasticIpId,
  AwsEfsFileSystemId,
  AwsEfsMountTargetId,
  AwsCloudFormationStackId,
  AwsElasticBeanstalkEnvironmentId,
  AwsInstanceId,
  AwsInternetGatewayId,
  AwsKeyPairId,
  AwsLoadBalancerId,
  AwsNatGatewayId,
  AwsNetworkInterfaceId,
  AwsPlacementGroupId,
  AwsRdsInstanceId,
  AwsRedshiftClusterId,
  AwsRouteTableId,
  AwsSecurityGroupId,
  AwsSnapshotId,
  AwsSubnetId,
  AwsTargetGroupId,
  AwsTransitGatewayAttachmentId,
  AwsTransitGatewayId,
  AwsVolumeId,
  AwsVpcId,
  AwsVpnConnectionId,
  AwsVpnGatewayId,
];

const typesByPrefixLength = [...generalResourceIdTypes].sort(
  (a, b) => b.prefix.length - a.prefix.length,
);

/**
 * Identify the type of a general format ID, trying longer prefixes first so
 * `tgw-attach-` wins over `tgw-`.
 */
export function resourceIdDetect(input: string): ResourceId | undefined {
  for (const type of typesByPrefixLength) {
    if (!input.startsWith(type.prefix)) {
      continue;
    }
    const result = type.parse(input);
    if (result.ok) {
      return result.value;
    }
  }
  return undefined;
}
