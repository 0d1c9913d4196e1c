/**
 * The tfsync command tree. Global flags map to the provider block; each command
 * runs one lifecycle operation and prints its result as JSON.
 */

import { type ResourceResult, VERSION, configureProvider } from '@tfsync/provider'
import { Command } from 'commander'
import { type GlobalOptions, collectTag, exitCodeFor, toProviderBlock } from './options'

interface ReadOptions {
  failOnDrift?: boolean
}

interface DeleteOptions {
  soft?: boolean
}

function report(result: ResourceResult, failOnDrift = false): void {
  const output = { state: result.state ?? null, diagnostics: result.diagnostics }
  console.log(JSON.stringify(output, null, 2))
  process.exitCode = exitCodeFor(result, failOnDrift)
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('tfsync')
    .description('Mirror Terraform Cloud workspace state into S3 objects')
    .version(VERSION)
    .option('--region <region>', 'AWS region (defaults to AWS_REGION)')
    .option('--endpoint <url>', 'Custom S3 endpoint for S3-compatible stores')
    .option('--force-path-style', 'Use path-style bucket addressing')
    .option('--role-arn <arn>', 'Role to assume with a web identity token')
    .option('--web-identity-token-file <path>', 'Web identity token file for --role-arn')
    .option('--soft-delete', 'Never delete objects; report a warning instead')

  const connect = () => {
    const provider = configureProvider(toProviderBlock(program.opts<GlobalOptions>()))
    if (provider.diagnostics.length > 0) {
      report({ diagnostics: provider.diagnostics })
    }
    return provider.resource
  }

  // Lifecycle commands
  program
    .command('read <workspace-id> <bucket> <key>')
    .description('Compare the workspace state with the mirrored object')
    .option('--fail-on-drift', 'Exit with code 2 when the digests differ')
    .action(async (workspaceId: string, bucket: string, key: string, options: ReadOptions) => {
      const resource = connect()
      if (process.exitCode) return

      const result = await resource.read({ workspace_id: workspaceId, bucket, key })
      report(result, options.failOnDrift)
    })

  program
    .command('sync <workspace-id> <bucket> <key>')
    .description('Write the workspace state to the object')
    .option('--kms-key-id <id>', 'KMS key for server-side encryption')
    .option('--tag <key=value>', 'Tag to apply to the object (repeatable)', collectTag)
    .option('--ignore-empty', 'Succeed without writing when the workspace has no state')
    .action(
      async (
        workspaceId: string,
        bucket: string,
        key: string,
        options: { kmsKeyId?: string; tag?: Record<string, string>; ignoreEmpty?: boolean },
      ) => {
        const resource = connect()
        if (process.exitCode) return

        const result = await resource.create({
          workspace_id: workspaceId,
          bucket,
          key,
          kms_key_id: options.kmsKeyId,
          tags: options.tag,
          ignore_empty: options.ignoreEmpty,
        })
        report(result)
      },
    )

  program
    .command('delete <workspace-id> <bucket> <key>')
    .description('Delete the mirrored object')
    .option('--soft', 'Leave the object in place and only report it')
    .action(async (workspaceId: string, bucket: string, key: string, options: DeleteOptions) => {
      const resource = connect()
      if (process.exitCode) return

      const result = await resource.delete({
        workspace_id: workspaceId,
        bucket,
        key,
        soft_delete: options.soft,
      })
      report(result)
    })

  return program
}
