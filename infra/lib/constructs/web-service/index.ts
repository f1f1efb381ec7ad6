import { Duration, RemovalPolicy } from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

import { AppConfig } from '../../shared/config';
import { getEnvSpecificName } from '../../shared/getEnvSpecificName';

import { WebAlb } from './web-alb';

interface WebServiceProps {
  vpc: ec2.IVpc;
  config: AppConfig;
  repository: ecr.IRepository;
  logsBucket: s3.IBucket;
}

export class WebService extends Construct {
  public readonly cluster: ecs.Cluster;
  public readonly service: ecs.FargateService;
  public readonly alb: WebAlb;
  private readonly serviceSecurityGroup: ec2.SecurityGroup;

  /**
   * Cluster and service names are fixed so the CI deploy role can be scoped
   * to them before the service exists.
   */
  public static names(config: Pick<AppConfig, 'project' | 'deployEnv'>) {
    return {
      clusterName: getEnvSpecificName(config, 'web-cluster'),
      serviceName: getEnvSpecificName(config, 'web-service'),
    };
  }

  constructor(
    scope: Construct,
    id: string,
    private readonly props: WebServiceProps
  ) {
    super(scope, id);

    this.serviceSecurityGroup = new ec2.SecurityGroup(this, 'ServiceSecurityGroup', {
      vpc: props.vpc,
      securityGroupName: getEnvSpecificName(props.config, 'WebServiceSecurityGroup'),
      description: 'Security group for the web service tasks',
      allowAllOutbound: true,
    });

    const taskDefinition = this.createTask();

    this.cluster = this.createCluster();
    this.service = this.createService(taskDefinition);

    const scalableTarget = this.createAutoScaling();

    this.alb = new WebAlb(this, 'WebAlb', {
      vpc: props.vpc,
      config: props.config,
      service: this.service,
      scalableTarget,
      serviceSecurityGroup: this.serviceSecurityGroup,
      logsBucket: props.logsBucket,
    });

    this.createAlarms();
  }

  private createTask() {
    const { config } = this.props;

    const taskRole = new iam.Role(this, 'WebTaskRole', {
      roleName: getEnvSpecificName(config, 'WebTaskRole'),
      assumedBy: new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
    });

    const executionRole = new iam.Role(this, 'WebTaskExecutionRole', {
      roleName: getEnvSpecificName(config, 'WebTaskExecutionRole'),
      assumedBy: new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AmazonECSTaskExecutionRolePolicy'),
      ],
    });

    const taskDefinition = new ecs.FargateTaskDefinition(this, 'WebTaskDefinition', {
      family: getEnvSpecificName(config, 'web-task-definition'),
      cpu: config.performanceMode ? 512 : 256,
      memoryLimitMiB: config.performanceMode ? 1024 : 512,
      taskRole, // application code role
      executionRole, // image pulls and log delivery
    });

    const logGroup = new logs.LogGroup(this, 'WebLogGroup', {
      logGroupName: getEnvSpecificName(config, 'WebLogGroup'),
      retention:
        config.deployEnv === 'prod' ? logs.RetentionDays.ONE_YEAR : logs.RetentionDays.ONE_WEEK,
      removalPolicy: config.deployEnv === 'prod' ? RemovalPolicy.RETAIN : RemovalPolicy.DESTROY,
    });

    taskDefinition.addContainer('WebContainer', {
      image: ecs.ContainerImage.fromEcrRepository(this.props.repository, config.imageTag),
      essential: true,
      portMappings: [
        {
          containerPort: config.containerPort,
          protocol: ecs.Protocol.TCP,
        },
      ],
      logging: ecs.LogDriver.awsLogs({
        streamPrefix: 'web',
        logGroup,
      }),
    });

    return taskDefinition;
  }

  private createCluster() {
    const { clusterName } = WebService.names(this.props.config);

    return new ecs.Cluster(this, 'WebCluster', {
      clusterName,
      vpc: this.props.vpc,
    });
  }

  private createService(taskDefinition: ecs.FargateTaskDefinition) {
    const { config } = this.props;
    const { serviceName } = WebService.names(config);

    return new ecs.FargateService(this, 'WebFargateService', {
      cluster: this.cluster,
      taskDefinition,
      serviceName,
      desiredCount: config.performanceMode ? 2 : 1,
      securityGroups: [this.serviceSecurityGroup],
      vpcSubnets: {
        subnetType: config.usePrivateSubnets
          ? ec2.SubnetType.PRIVATE_WITH_EGRESS
          : ec2.SubnetType.PUBLIC,
      },
      // tasks in public subnets need an address to pull from ECR
      assignPublicIp: !config.usePrivateSubnets,
      circuitBreaker: { rollback: true },
      enableExecuteCommand: true,
      healthCheckGracePeriod: Duration.seconds(60),
      maxHealthyPercent: 200,
      minHealthyPercent: 100,
    });
  }

  private createAutoScaling() {
    const { config } = this.props;

    const scalableTarget = this.service.autoScaleTaskCount({
      minCapacity: config.performanceMode ? 2 : 1,
      maxCapacity: config.performanceMode ? 8 : 4,
    });

    scalableTarget.scaleOnCpuUtilization('CpuScaling', {
      targetUtilizationPercent: 60,
      policyName: getEnvSpecificName(config, 'WebCpuScalingPolicy'),
      scaleInCooldown: Duration.seconds(60),
      scaleOutCooldown: Duration.seconds(60),
    });

    scalableTarget.scaleOnMemoryUtilization('MemoryScaling', {
      targetUtilizationPercent: 60,
      policyName: getEnvSpecificName(config, 'WebMemoryScalingPolicy'),
      scaleInCooldown: Duration.seconds(60),
      scaleOutCooldown: Duration.seconds(60),
    });

    return scalableTarget;
  }

  private createAlarms() {
    new cloudwatch.Alarm(this, 'WebCpuAlarm', {
      metric: this.service.metricCpuUtilization({
        period: Duration.minutes(1),
      }),
      alarmName: getEnvSpecificName(this.props.config, 'WebCpuAlarm'),
      threshold: 80,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    });

    new cloudwatch.Alarm(this, 'WebMemoryAlarm', {
      metric: this.service.metricMemoryUtilization({
        period: Duration.minutes(1),
      }),
      alarmName: getEnvSpecificName(this.props.config, 'WebMemoryAlarm'),
      threshold: 70,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    });
  }
}
