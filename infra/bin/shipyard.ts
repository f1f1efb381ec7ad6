#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import dotenv from 'dotenv';

import { getAppConfig, getStackEnvConfig } from '../lib/shared/config';
import { getEnvSpecificName } from '../lib/shared/getEnvSpecificName';
import { AppStack } from '../lib/stacks/app-stack';
import { NetworkStack } from '../lib/stacks/network-stack';
import { RegistryStack } from '../lib/stacks/registry-stack';

dotenv.config({ path: '.env.local' });

const appConfig = getAppConfig();
const stackEnvConfig = getStackEnvConfig();

const app = new cdk.App();
const networkStackName = getEnvSpecificName(appConfig, 'NetworkStack');
const registryStackName = getEnvSpecificName(appConfig, 'RegistryStack');
const appStackName = getEnvSpecificName(appConfig, 'AppStack');

const networkStack = new NetworkStack(app, networkStackName, {
  config: appConfig,
  env: stackEnvConfig,
});

const registryStack = new RegistryStack(app, registryStackName, {
  config: appConfig,
  env: stackEnvConfig,
});

new AppStack(app, appStackName, {
  config: appConfig,
  env: stackEnvConfig,
  vpc: networkStack.vpc,
  repository: registryStack.repository,
  logsBucket: networkStack.logsBucket,
});

app.synth();
