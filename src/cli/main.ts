import { loadEnvironmentConfig } from '../config/environment';
import { runDigest, type RunDigestDeps } from '../pipeline/run-digest';
import { DigestError } from '../utils/errors';
import { isLogLevel, logger } from '../utils/logger';
import { parseCliArgs, USAGE } from './args';

export type MainDeps = Partial<RunDigestDeps> & {
  env?: Record<string, string | undefined>;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

/**
 * One CLI invocation. Resolves with the process exit code and never rejects:
 * 0 on success, 1 when the run fails, 2 on bad flags.
 */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const { env = process.env, stdout = (text: string) => console.log(text), stderr = (text: string) => console.error(text), ...runDeps } = deps;
  const log = runDeps.logger ?? logger;

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      stdout(USAGE);
      return 0;
    }

    const config = loadEnvironmentConfig(env);
    if (log === logger && isLogLevel(config.logging.level)) {
      logger.setLevel(config.logging.level);
    }

    const result = await runDigest(
      {
        config,
        hours: args.hours,
        dryRun: args.dryRun,
        opmlPath: args.opmlPath
      },
      { print: stdout, ...runDeps }
    );

    if (result.sent) {
      stdout('Sent.');
    }
    return 0;
  } catch (error) {
    if (error instanceof DigestError) {
      stderr(error.message);
      if (error.exitCode === 2) {
        stderr(USAGE);
      }
      return error.exitCode;
    }
    log.error('Digest run failed unexpectedly', error);
    return 1;
  }
}
