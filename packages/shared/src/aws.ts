import { z } from 'zod';

export const awsAccountIdSchema = z
  .string()
  .regex(/^\d{12}$/, 'AWS account id must be exactly 12 digits');

export const awsRegionSchema = z
  .string()
  .regex(/^[a-z]{2}(-gov)?-[a-z]+-\d$/, 'AWS region must look like us-east-1');

export const ecrRepositoryNameSchema = z
  .string()
  .min(2)
  .max(256)
  .regex(
    /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/,
    'ECR repository names are lowercase letters, digits and . _ - / separators'
  );

export const imageTagSchema = z
  .string()
  .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/, 'Invalid image tag');

export const ecsResourceNameSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9_-]{1,255}$/,
    'ECS cluster and service names are up to 255 letters, digits, hyphens and underscores'
  );

export interface ImageReference {
  account: string;
  region: string;
  repository: string;
  tag: string;
}

export const registryHost = (account: string, region: string) =>
  `${account}.dkr.ecr.${region}.amazonaws.com`;

export const imageUri = ({ account, region, repository, tag }: ImageReference) =>
  `${registryHost(account, region)}/${repository}:${tag}`;
