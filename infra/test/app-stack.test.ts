import { Match, Template } from 'aws-cdk-lib/assertions';

import { createStacks, testConfig } from './stack-fixtures';

const CERTIFICATE_ARN = 'arn:aws:acm:us-east-1:000000000000:certificate/test';

describe('AppStack', () => {
  let template: Template;

  beforeEach(() => {
    template = Template.fromStack(createStacks(testConfig()).appStack);
  });

  test('should run the web service on Fargate under fixed names', () => {
    template.hasResourceProperties('AWS::ECS::Cluster', {
      ClusterName: 'shipyard-dev-web-cluster',
    });
    template.hasResourceProperties('AWS::ECS::Service', {
      ServiceName: 'shipyard-dev-web-service',
      LaunchType: 'FARGATE',
      DesiredCount: 1,
      EnableExecuteCommand: true,
      DeploymentConfiguration: Match.objectLike({
        DeploymentCircuitBreaker: { Enable: true, Rollback: true },
        MaximumPercent: 200,
        MinimumHealthyPercent: 100,
      }),
    });
  });

  test('should size the task for the default mode', () => {
    template.hasResourceProperties('AWS::ECS::TaskDefinition', {
      Cpu: '256',
      Memory: '512',
      RequiresCompatibilities: ['FARGATE'],
      ContainerDefinitions: [
        Match.objectLike({
          Essential: true,
          PortMappings: [{ ContainerPort: 80, Protocol: 'tcp' }],
        }),
      ],
    });
  });

  test('should front the service with an internet-facing load balancer', () => {
    template.hasResourceProperties('AWS::ElasticLoadBalancingV2::LoadBalancer', {
      Name: 'shipyard-dev-web-alb',
      Scheme: 'internet-facing',
      LoadBalancerAttributes: Match.arrayWith([
        { Key: 'access_logs.s3.enabled', Value: 'true' },
        { Key: 'access_logs.s3.prefix', Value: 'alb' },
      ]),
    });
    template.hasResourceProperties('AWS::ElasticLoadBalancingV2::TargetGroup', {
      Name: 'shipyard-dev-web-tg',
      HealthCheckPath: '/',
      Matcher: { HttpCode: '200-399' },
      TargetType: 'ip',
    });
  });

  test('should forward plain HTTP when no certificate is configured', () => {
    template.resourceCountIs('AWS::ElasticLoadBalancingV2::Listener', 1);
    template.hasResourceProperties('AWS::ElasticLoadBalancingV2::Listener', {
      Port: 80,
      Protocol: 'HTTP',
      DefaultActions: [Match.objectLike({ Type: 'forward' })],
    });
  });

  test('should terminate TLS and redirect HTTP when a certificate is configured', () => {
    const secured = Template.fromStack(
      createStacks(testConfig({ certificateArn: CERTIFICATE_ARN })).appStack
    );

    secured.resourceCountIs('AWS::ElasticLoadBalancingV2::Listener', 2);
    secured.hasResourceProperties('AWS::ElasticLoadBalancingV2::Listener', {
      Port: 443,
      Protocol: 'HTTPS',
      Certificates: [{ CertificateArn: CERTIFICATE_ARN }],
      DefaultActions: [Match.objectLike({ Type: 'forward' })],
    });
    secured.hasResourceProperties('AWS::ElasticLoadBalancingV2::Listener', {
      Port: 80,
      Protocol: 'HTTP',
      DefaultActions: [
        Match.objectLike({
          Type: 'redirect',
          RedirectConfig: Match.objectLike({
            Protocol: 'HTTPS',
            Port: '443',
            StatusCode: 'HTTP_301',
          }),
        }),
      ],
    });
  });

  test('should scale between one and four tasks', () => {
    template.hasResourceProperties('AWS::ApplicationAutoScaling::ScalableTarget', {
      MinCapacity: 1,
      MaxCapacity: 4,
    });
  });

  test('should alarm on CPU, memory and unhealthy targets', () => {
    template.hasResourceProperties('AWS::CloudWatch::Alarm', {
      AlarmName: 'shipyard-dev-WebCpuAlarm',
      Threshold: 80,
    });
    template.hasResourceProperties('AWS::CloudWatch::Alarm', {
      AlarmName: 'shipyard-dev-WebMemoryAlarm',
      Threshold: 70,
    });
    template.hasResourceProperties('AWS::CloudWatch::Alarm', {
      AlarmName: 'shipyard-dev-WebAlbUnhealthyHostsAlarm',
      Threshold: 0,
    });
  });

  test('should only admit load balancer traffic on the container port', () => {
    template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
      IpProtocol: 'tcp',
      FromPort: 80,
      ToPort: 80,
      SourceSecurityGroupId: Match.anyValue(),
    });
  });

  test('should export the names the deploy command needs', () => {
    template.hasOutput('LoadBalancerDNS', {});
    template.hasOutput('ClusterName', {});
    template.hasOutput('ServiceName', {});
  });

  test('should double capacity in performance mode', () => {
    const performance = Template.fromStack(
      createStacks(testConfig({ performanceMode: true })).appStack
    );

    performance.hasResourceProperties('AWS::ECS::TaskDefinition', {
      Cpu: '512',
      Memory: '1024',
    });
    performance.hasResourceProperties('AWS::ECS::Service', { DesiredCount: 2 });
    performance.hasResourceProperties('AWS::ApplicationAutoScaling::ScalableTarget', {
      MinCapacity: 2,
      MaxCapacity: 8,
    });
  });

  test('should give tasks public addresses when private subnets are disabled', () => {
    const publicOnly = Template.fromStack(
      createStacks(testConfig({ usePrivateSubnets: false })).appStack
    );

    publicOnly.hasResourceProperties('AWS::ECS::Service', {
      NetworkConfiguration: {
        AwsvpcConfiguration: Match.objectLike({ AssignPublicIp: 'ENABLED' }),
      },
    });
  });
});
