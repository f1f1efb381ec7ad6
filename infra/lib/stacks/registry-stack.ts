import { CfnOutput, RemovalPolicy, Stack, StackProps, Tags } from 'aws-cdk-lib';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';

import { GitHubDeployRole } from '../constructs/github-deploy-role';
import { AppConfig, StackEnvConfig } from '../shared/config';
import { getEnvSpecificName } from '../shared/getEnvSpecificName';

export interface RegistryStackProps extends StackProps {
  config: AppConfig;
  env: StackEnvConfig;
}

export class RegistryStack extends Stack {
  public readonly repository: ecr.Repository;
  public readonly deployRole?: iam.Role;

  constructor(
    scope: Construct,
    id: string,
    private readonly props: RegistryStackProps
  ) {
    super(scope, id, props);

    this.repository = this.createRepository();

    if (props.config.github) {
      this.deployRole = new GitHubDeployRole(this, getEnvSpecificName(props.config, 'GitHubDeploy'), {
        config: props.config,
        github: props.config.github,
        repository: this.repository,
      }).role;

      new CfnOutput(this, 'DeployRoleArn', {
        value: this.deployRole.roleArn,
        description: 'Set as the AWS_ROLE_ARN secret of the GitHub repository',
      });
    }

    new CfnOutput(this, 'RepositoryUri', {
      value: this.repository.repositoryUri,
      description: 'Push images here',
    });

    Tags.of(this).add('Project', props.config.project);
    Tags.of(this).add('Environment', props.config.deployEnv);
  }

  private createRepository() {
    const isProd = this.props.config.deployEnv === 'prod';

    return new ecr.Repository(this, 'Repository', {
      repositoryName: this.props.config.repositoryName,
      imageScanOnPush: true,
      imageTagMutability: ecr.TagMutability.MUTABLE,
      lifecycleRules: [
        {
          description: 'Keep the most recent images',
          maxImageCount: isProd ? 20 : 10,
        },
      ],
      removalPolicy: isProd ? RemovalPolicy.RETAIN : RemovalPolicy.DESTROY,
      emptyOnDelete: !isProd,
    });
  }
}
