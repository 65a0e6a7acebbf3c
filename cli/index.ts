import { packageVersion } from '../config/defaults'
import { createGetCommand } from './commands/get'

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createGetCommand().version(
    packageVersion,
    '-v, --version',
    'output the version number',
  )

  await program.parseAsync(argv)
}
