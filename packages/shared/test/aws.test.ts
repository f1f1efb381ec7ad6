import {
  awsAccountIdSchema,
  awsRegionSchema,
  ecrRepositoryNameSchema,
  ecsResourceNameSchema,
  imageTagSchema,
  imageUri,
  registryHost,
} from '../src';

describe('AWS naming rules', () => {
  test('should accept a 12 digit account id', () => {
    expect(awsAccountIdSchema.safeParse('000000000000').success).toBe(true);
  });

  test.each(['<aws_account_id>', 'your-account-id', '12345', '1234567890123'])(
    'should reject account id %s',
    (value) => {
      expect(awsAccountIdSchema.safeParse(value).success).toBe(false);
    }
  );

  test.each(['us-east-1', 'eu-central-1', 'us-gov-west-1', 'ap-southeast-2'])(
    'should accept region %s',
    (value) => {
      expect(awsRegionSchema.safeParse(value).success).toBe(true);
    }
  );

  test.each(['US-EAST-1', 'us-east', 'useast1'])('should reject region %s', (value) => {
    expect(awsRegionSchema.safeParse(value).success).toBe(false);
  });

  test.each(['web', 'my-app', 'team/web.frontend', 'app_2'])(
    'should accept repository %s',
    (value) => {
      expect(ecrRepositoryNameSchema.safeParse(value).success).toBe(true);
    }
  );

  test.each(['shipyard-dev-web-cluster', 'web_service', 'A1'])(
    'should accept ECS name %s',
    (value) => {
      expect(ecsResourceNameSchema.safeParse(value).success).toBe(true);
    }
  );

  test.each(['prod: blue', 'web #1', '', 'x'.repeat(256)])('should reject ECS name %j', (value) => {
    expect(ecsResourceNameSchema.safeParse(value).success).toBe(false);
  });

  test.each(['My-App', 'a', '-web', 'web-', 'team//web'])('should reject repository %s', (value) => {
    expect(ecrRepositoryNameSchema.safeParse(value).success).toBe(false);
  });

  test('should validate image tags', () => {
    expect(imageTagSchema.safeParse('latest').success).toBe(true);
    expect(imageTagSchema.safeParse('v1.2.3-rc_1').success).toBe(true);
    expect(imageTagSchema.safeParse('.hidden').success).toBe(false);
    expect(imageTagSchema.safeParse('a'.repeat(129)).success).toBe(false);
  });

  test('should build registry and image URIs', () => {
    expect(registryHost('000000000000', 'eu-west-1')).toBe(
      '000000000000.dkr.ecr.eu-west-1.amazonaws.com'
    );
    expect(
      imageUri({ account: '000000000000', region: 'us-east-1', repository: 'web', tag: 'v2' })
    ).toBe('000000000000.dkr.ecr.us-east-1.amazonaws.com/web:v2');
  });
});
