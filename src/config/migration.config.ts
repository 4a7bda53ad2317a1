import { z } from 'zod';
import { SetupError } from '../errors/migration.errors';

/** Flat option bag as produced by the CLI (flags or their environment variables). */
export type CliOptions = {
  sourceEndpoint?: string;
  sourceRegion?: string;
  sourceAccessKeyId?: string;
  sourceSecretAccessKey?: string;
  sourceBucket?: string;
  destinationType?: string;
  destinationEndpoint?: string;
  destinationRegion?: string;
  destinationAccessKeyId?: string;
  destinationSecretAccessKey?: string;
  destinationBucket?: string;
  swiftAuthUrl?: string;
  swiftUser?: string;
  swiftPassword?: string;
  swiftTenantName?: string;
  swiftRegion?: string;
  swiftStorageUrl?: string;
  swiftAuthToken?: string;
  pageSize?: number;
  discovery?: string;
  exclude?: string[] | string;
  knownFolder?: string[];
  preload?: boolean;
  createDestination?: boolean;
};

const required = (label: string) => z.string({ required_error: `${label} is required` }).min(1, `${label} is required`);

const S3StoreSchema = z.object({
  kind: z.literal('s3'),
  endpoint: z.string().url().optional(),
  region: z.string().min(1).default('us-east-1'),
  forcePathStyle: z.boolean().default(true),
  accessKeyId: required('access key id'),
  secretAccessKey: required('secret access key'),
  bucket: required('bucket'),
});

// Keystone credentials are checked in loadMigrationConfig: a pre-issued
// storage URL and token make them unnecessary.
const SwiftStoreSchema = z.object({
  kind: z.literal('swift'),
  authUrl: z.string().url().optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  tenantName: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
  storageUrl: z.string().url().optional(),
  authToken: z.string().min(1).optional(),
  container: required('container'),
});

export const MigrationConfigSchema = z.object({
  source: S3StoreSchema,
  destination: z.discriminatedUnion('kind', [S3StoreSchema, SwiftStoreSchema]),
  discovery: z.enum(['suffix', 'content-type']).default('suffix'),
  preload: z.boolean().default(true),
  createDestination: z.boolean().default(true),
  exclude: z.array(z.string().min(1)).default(['default']),
  knownFolders: z.array(z.string().min(1)).default([]),
  pageSize: z.number().int().positive().optional(),
});

export type S3StoreConfig = z.infer<typeof S3StoreSchema>;
export type SwiftStoreConfig = z.infer<typeof SwiftStoreSchema>;
export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;

function splitList(value: string[] | string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = (Array.isArray(value) ? value : [value]).flatMap((item) => item.split(','));
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

// Empty environment variables count as unset.
function withoutBlanks(options: CliOptions): CliOptions {
  const cleaned: CliOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== '') {
      Object.assign(cleaned, { [key]: value });
    }
  }
  return cleaned;
}

const KEYSTONE_SETTINGS = [
  ['swiftAuthUrl', 'authUrl', 'auth URL'],
  ['swiftUser', 'username', 'user'],
  ['swiftPassword', 'password', 'password'],
  ['swiftTenantName', 'tenantName', 'tenant name'],
] as const;

function swiftCredentialIssues(options: CliOptions): string[] {
  const { swiftStorageUrl, swiftAuthToken } = options;
  if (swiftStorageUrl && swiftAuthToken) {
    return [];
  }
  const issues = KEYSTONE_SETTINGS.filter(([option]) => !options[option]).map(
    ([, field, label]) => `destination.${field}: ${label} is required`
  );
  if (swiftStorageUrl || swiftAuthToken) {
    issues.push('destination.storageUrl: storage URL and auth token must be given together');
  }
  return issues;
}

export function loadMigrationConfig(cliOptions: CliOptions): MigrationConfig {
  const options = withoutBlanks(cliOptions);
  const kind = options.destinationType ?? 'swift';
  const result = MigrationConfigSchema.safeParse({
    source: {
      kind: 's3',
      endpoint: options.sourceEndpoint,
      region: options.sourceRegion,
      accessKeyId: options.sourceAccessKeyId,
      secretAccessKey: options.sourceSecretAccessKey,
      bucket: options.sourceBucket,
    },
    destination:
      kind === 'swift'
        ? {
            kind,
            authUrl: options.swiftAuthUrl,
            username: options.swiftUser,
            password: options.swiftPassword,
            tenantName: options.swiftTenantName,
            region: options.swiftRegion,
            storageUrl: options.swiftStorageUrl,
            authToken: options.swiftAuthToken,
            container: options.destinationBucket,
          }
        : {
            kind,
            endpoint: options.destinationEndpoint,
            region: options.destinationRegion,
            accessKeyId: options.destinationAccessKeyId,
            secretAccessKey: options.destinationSecretAccessKey,
            bucket: options.destinationBucket,
          },
    discovery: options.discovery,
    preload: options.preload,
    createDestination: options.createDestination,
    exclude: splitList(options.exclude),
    knownFolders: options.knownFolder,
    pageSize: options.pageSize,
  });

  const issues = result.success
    ? []
    : result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  if (kind === 'swift') {
    issues.push(...swiftCredentialIssues(options));
  }
  if (!result.success || issues.length > 0) {
    throw new SetupError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
