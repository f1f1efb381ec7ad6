import { AppConfig } from './config';

export const getEnvSpecificName = (
  config: Pick<AppConfig, 'project' | 'deployEnv'>,
  name: string
) => {
  return `${config.project}-${config.deployEnv}-${name}`;
};
