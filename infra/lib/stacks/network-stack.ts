import { Duration, RemovalPolicy, Stack, StackProps, Tags } from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

import { AppConfig, StackEnvConfig } from '../shared/config';
import { getEnvSpecificName } from '../shared/getEnvSpecificName';

export interface NetworkStackProps extends StackProps {
  config: AppConfig;
  env: StackEnvConfig;
}

export class NetworkStack extends Stack {
  public readonly vpc: ec2.Vpc;
  public readonly logsBucket: s3.Bucket;

  constructor(scope: Construct, id: string, props: NetworkStackProps) {
    super(scope, id, props);

    const { config } = props;
    const isProd = config.deployEnv === 'prod';
    const vpcName = getEnvSpecificName(config, 'vpc');

    const subnetConfiguration: ec2.SubnetConfiguration[] = [
      {
        name: 'Public',
        subnetType: ec2.SubnetType.PUBLIC,
        cidrMask: 24,
      },
    ];

    if (config.usePrivateSubnets) {
      subnetConfiguration.push({
        name: 'Private',
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
        cidrMask: 24,
      });
    }

    this.vpc = new ec2.Vpc(this, vpcName, {
      maxAzs: 2,
      vpcName,
      ipAddresses: ec2.IpAddresses.cidr('10.231.0.0/16'),
      subnetConfiguration,
      enableDnsHostnames: true,
      enableDnsSupport: true,
      gatewayEndpoints: {
        S3: {
          service: ec2.GatewayVpcEndpointAwsService.S3,
        },
      },
      // one per AZ when it matters
      natGateways: config.usePrivateSubnets ? (isProd || config.performanceMode ? 2 : 1) : 0,
    });

    this.vpc.publicSubnets.forEach((subnet, index) => {
      Tags.of(subnet).add('Name', getEnvSpecificName(config, `public-subnet-${index + 1}`));
    });

    this.vpc.privateSubnets.forEach((subnet, index) => {
      Tags.of(subnet).add('Name', getEnvSpecificName(config, `private-subnet-${index + 1}`));
    });

    // VPC flow logs and load balancer access logs
    this.logsBucket = new s3.Bucket(this, getEnvSpecificName(config, 'logs-bucket'), {
      bucketName: getEnvSpecificName(config, `logs-${this.account}`),
      lifecycleRules: [
        {
          transitions: [
            {
              storageClass: s3.StorageClass.INFREQUENT_ACCESS,
              transitionAfter: Duration.days(30),
            },
          ],
          expiration: Duration.days(isProd ? 365 : 90),
        },
      ],
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      removalPolicy: isProd ? RemovalPolicy.RETAIN : RemovalPolicy.DESTROY,
      autoDeleteObjects: !isProd,
    });

    new ec2.FlowLog(this, 'VPCFlowLogs', {
      resourceType: ec2.FlowLogResourceType.fromVpc(this.vpc),
      destination: ec2.FlowLogDestination.toS3(this.logsBucket, 'vpc-flow-logs', {
        fileFormat: ec2.FlowLogFileFormat.PARQUET,
      }),
      flowLogName: getEnvSpecificName(config, 'vpc-flow-logs'),
      trafficType: ec2.FlowLogTrafficType.ALL,
    });

    Tags.of(this).add('Project', config.project);
    Tags.of(this).add('Environment', config.deployEnv);
  }
}
