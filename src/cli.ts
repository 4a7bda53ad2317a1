import { Command, Option } from 'commander';

// Blank values count as unset; anything else is left for config validation.
function parseCount(value: string): number | undefined {
  return value.trim() === '' ? undefined : Number(value);
}

export function buildProgram(): Command {
  return new Command()
    .name('object-store-migration')
    .description(
      'Copies every object of a Ceph S3 bucket into a Swift container or S3 bucket. ' +
        'Options can also be set through the environment variables shown.'
    )
    .addOption(new Option('--source-endpoint <url>', 'Ceph S3 endpoint').env('SOURCE_ENDPOINT'))
    .addOption(new Option('--source-region <region>', 'source region').env('SOURCE_AWS_REGION'))
    .addOption(new Option('--source-access-key-id <id>', 'source access key id').env('SOURCE_AWS_ACCESS_KEY_ID'))
    .addOption(
      new Option('--source-secret-access-key <key>', 'source secret access key').env('SOURCE_AWS_SECRET_ACCESS_KEY')
    )
    .addOption(new Option('--source-bucket <name>', 'bucket to copy from').env('SOURCE_BUCKET'))
    .addOption(
      new Option('--destination-type <type>', 'destination backend')
        .choices(['swift', 's3'])
        .env('DESTINATION_TYPE')
    )
    .addOption(new Option('--destination-endpoint <url>', 'S3 destination endpoint').env('DESTINATION_ENDPOINT'))
    .addOption(new Option('--destination-region <region>', 'S3 destination region').env('DESTINATION_AWS_REGION'))
    .addOption(
      new Option('--destination-access-key-id <id>', 'S3 destination access key id').env('DESTINATION_AWS_ACCESS_KEY_ID')
    )
    .addOption(
      new Option('--destination-secret-access-key <key>', 'S3 destination secret access key').env(
        'DESTINATION_AWS_SECRET_ACCESS_KEY'
      )
    )
    .addOption(new Option('--destination-bucket <name>', 'bucket or container to copy into').env('DESTINATION_BUCKET'))
    .addOption(new Option('--swift-auth-url <url>', 'Keystone v2 auth URL').env('SWIFT_AUTH_URL'))
    .addOption(new Option('--swift-user <user>', 'Swift user').env('SWIFT_USER'))
    .addOption(new Option('--swift-password <password>', 'Swift password').env('SWIFT_PASSWORD'))
    .addOption(new Option('--swift-tenant-name <tenant>', 'Swift tenant').env('SWIFT_TENANT_NAME'))
    .addOption(new Option('--swift-region <region>', 'object-store region in the service catalog').env('SWIFT_REGION'))
    .addOption(
      new Option('--swift-storage-url <url>', 'pre-issued storage URL, skips Keystone with --swift-auth-token').env(
        'SWIFT_STORAGE_URL'
      )
    )
    .addOption(new Option('--swift-auth-token <token>', 'pre-issued Swift token').env('SWIFT_AUTH_TOKEN'))
    .addOption(
      new Option('--page-size <count>', 'objects per listing request').env('PAGE_SIZE').argParser(parseCount)
    )
    .addOption(
      new Option('--discovery <mode>', 'how existing folders are recognised')
        .choices(['suffix', 'content-type'])
        .env('FOLDER_DISCOVERY')
    )
    .addOption(
      new Option('--exclude <substring...>', 'skip keys containing any of these (default: "default")').env(
        'EXCLUDE_SUBSTRINGS'
      )
    )
    .addOption(new Option('--known-folder <prefix...>', 'folders to treat as already present'))
    .option('--no-preload', 'check the destination per object instead of listing it up front')
    .option('--no-create-destination', 'fail when the destination container does not exist');
}
