import { Stack } from 'aws-cdk-lib';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';

import { AppConfig } from '../shared/config';
import { getEnvSpecificName } from '../shared/getEnvSpecificName';

import { WebService } from './web-service';

const GITHUB_OIDC_HOST = 'token.actions.githubusercontent.com';

interface GitHubDeployRoleProps {
  config: AppConfig;
  github: NonNullable<AppConfig['github']>;
  repository: ecr.IRepository;
}

/**
 * Role assumed by the GitHub Actions deploy job through OIDC. It can push to
 * the image repository and force a new deployment of the web service.
 */
export class GitHubDeployRole extends Construct {
  public readonly role: iam.Role;

  constructor(scope: Construct, id: string, props: GitHubDeployRoleProps) {
    super(scope, id);

    const { config, github } = props;

    const provider = new iam.OpenIdConnectProvider(this, 'GitHubOidcProvider', {
      url: `https://${GITHUB_OIDC_HOST}`,
      clientIds: ['sts.amazonaws.com'],
    });

    this.role = new iam.Role(this, 'GitHubActionsDeployRole', {
      roleName: getEnvSpecificName(config, 'github-deploy'),
      assumedBy: new iam.FederatedPrincipal(
        provider.openIdConnectProviderArn,
        {
          StringEquals: {
            [`${GITHUB_OIDC_HOST}:aud`]: 'sts.amazonaws.com',
            [`${GITHUB_OIDC_HOST}:sub`]: `repo:${github.repository}:ref:refs/heads/${github.branch}`,
          },
        },
        'sts:AssumeRoleWithWebIdentity'
      ),
      description: `Role for GitHub Actions in ${github.repository} to push images and roll the web service`,
    });

    // GetAuthorizationToken has no resource-level permissions
    this.role.addToPolicy(
      new iam.PolicyStatement({
        effect: iam.Effect.ALLOW,
        actions: ['ecr:GetAuthorizationToken'],
        resources: ['*'],
      })
    );

    props.repository.grantPullPush(this.role);

    const { clusterName, serviceName } = WebService.names(config);

    this.role.addToPolicy(
      new iam.PolicyStatement({
        effect: iam.Effect.ALLOW,
        actions: ['ecs:UpdateService', 'ecs:DescribeServices'],
        resources: [
          Stack.of(this).formatArn({
            service: 'ecs',
            resource: 'service',
            resourceName: `${clusterName}/${serviceName}`,
          }),
        ],
      })
    );
  }
}
