import { CfnOutput, Stack, StackProps, Tags } from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

import { WebService } from '../constructs/web-service';
import { AppConfig, StackEnvConfig } from '../shared/config';
import { getEnvSpecificName } from '../shared/getEnvSpecificName';

export interface AppStackProps extends StackProps {
  config: AppConfig;
  env: StackEnvConfig;
  vpc: ec2.IVpc;
  repository: ecr.IRepository;
  logsBucket: s3.IBucket;
}

export class AppStack extends Stack {
  public readonly webService: WebService;

  constructor(
    scope: Construct,
    id: string,
    private readonly props: AppStackProps
  ) {
    super(scope, id, props);

    this.webService = this.createWebService();

    new CfnOutput(this, 'LoadBalancerDNS', {
      value: this.webService.alb.loadBalancer.loadBalancerDnsName,
      description: 'DNS name of the web load balancer',
    });

    new CfnOutput(this, 'ClusterName', {
      value: this.webService.cluster.clusterName,
      description: 'Pass to shipyard deploy --ecs-cluster',
    });

    new CfnOutput(this, 'ServiceName', {
      value: this.webService.service.serviceName,
      description: 'Pass to shipyard deploy --ecs-service',
    });

    Tags.of(this).add('Project', props.config.project);
    Tags.of(this).add('Environment', props.config.deployEnv);
  }

  private createWebService() {
    return new WebService(this, getEnvSpecificName(this.props.config, 'WebService'), {
      vpc: this.props.vpc,
      config: this.props.config,
      repository: this.props.repository,
      logsBucket: this.props.logsBucket,
    });
  }
}
