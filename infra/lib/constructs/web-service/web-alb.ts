import { Duration } from 'aws-cdk-lib';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

import { AppConfig } from '../../shared/config';
import { getEnvSpecificName } from '../../shared/getEnvSpecificName';

interface WebAlbProps {
  vpc: ec2.IVpc;
  config: AppConfig;
  service: ecs.FargateService;
  scalableTarget: ecs.ScalableTaskCount;
  serviceSecurityGroup: ec2.SecurityGroup;
  logsBucket: s3.IBucket;
}

export class WebAlb extends Construct {
  public readonly loadBalancer: elbv2.ApplicationLoadBalancer;
  public readonly loadBalancerSecurityGroup: ec2.SecurityGroup;
  public readonly targetGroup: elbv2.ApplicationTargetGroup;

  constructor(scope: Construct, id: string, props: WebAlbProps) {
    super(scope, id);

    const { config } = props;

    this.loadBalancerSecurityGroup = new ec2.SecurityGroup(this, 'LoadBalancerSecurityGroup', {
      vpc: props.vpc,
      securityGroupName: getEnvSpecificName(config, 'WebLoadBalancerSecurityGroup'),
      description: 'Security group for the web load balancer',
      allowAllOutbound: true,
    });

    this.loadBalancerSecurityGroup.addIngressRule(
      ec2.Peer.anyIpv4(),
      ec2.Port.tcp(80),
      'Allow HTTP traffic from anywhere'
    );
    this.loadBalancerSecurityGroup.addIngressRule(
      ec2.Peer.anyIpv4(),
      ec2.Port.tcp(443),
      'Allow HTTPS traffic from anywhere'
    );

    this.loadBalancer = new elbv2.ApplicationLoadBalancer(this, 'WebALB', {
      vpc: props.vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PUBLIC,
      },
      securityGroup: this.loadBalancerSecurityGroup,
      loadBalancerName: getEnvSpecificName(config, 'web-alb'),
      internetFacing: true,
    });

    this.loadBalancer.logAccessLogs(props.logsBucket, 'alb');

    this.targetGroup = new elbv2.ApplicationTargetGroup(this, 'TargetGroup', {
      targets: [props.service],
      port: config.containerPort,
      vpc: props.vpc,
      targetGroupName: getEnvSpecificName(config, 'web-tg'),
      deregistrationDelay: Duration.seconds(30),
      protocol: elbv2.ApplicationProtocol.HTTP,
      healthCheck: {
        path: config.healthCheckPath,
        port: 'traffic-port',
        healthyThresholdCount: 2,
        unhealthyThresholdCount: 3,
        timeout: Duration.seconds(10),
        interval: Duration.seconds(30),
        healthyHttpCodes: '200-399',
      },
    });

    if (config.certificateArn) {
      const certificate = acm.Certificate.fromCertificateArn(
        this,
        'Certificate',
        config.certificateArn
      );

      this.loadBalancer.addListener('HttpsListener', {
        port: 443,
        protocol: elbv2.ApplicationProtocol.HTTPS,
        certificates: [certificate],
        open: false,
        defaultAction: elbv2.ListenerAction.forward([this.targetGroup]),
      });

      this.loadBalancer.addListener('HttpListener', {
        port: 80,
        protocol: elbv2.ApplicationProtocol.HTTP,
        open: false,
        defaultAction: elbv2.ListenerAction.redirect({
          protocol: 'HTTPS',
          port: '443',
          permanent: true,
        }),
      });
    } else {
      this.loadBalancer.addListener('HttpListener', {
        port: 80,
        protocol: elbv2.ApplicationProtocol.HTTP,
        open: false,
        defaultAction: elbv2.ListenerAction.forward([this.targetGroup]),
      });
    }

    new cloudwatch.Alarm(this, 'AlbUnhealthyHostsAlarm', {
      metric: this.targetGroup.metrics.unhealthyHostCount({
        statistic: 'Maximum',
        period: Duration.minutes(5),
      }),
      alarmName: getEnvSpecificName(config, 'WebAlbUnhealthyHostsAlarm'),
      threshold: 0, // any unhealthy target
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
    });

    props.scalableTarget.scaleOnMetric('ScaleOnRequestCount', {
      metric: this.loadBalancer.metrics.requestCount({
        period: Duration.minutes(1),
      }),
      scalingSteps: [
        { lower: 100, change: 1 },
        { lower: 200, change: 2 },
      ],
      evaluationPeriods: 2,
    });

    // ALB -> tasks, on the container port only
    props.serviceSecurityGroup.addIngressRule(
      ec2.Peer.securityGroupId(this.loadBalancerSecurityGroup.securityGroupId),
      ec2.Port.tcp(config.containerPort),
      'Allow traffic from the load balancer'
    );
  }
}
