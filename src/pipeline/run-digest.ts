/**
 * Digest run coordinating the following workflow:
 * 1. Fetches the reading list for the lookback window
 * 2. Builds the digest (dedupe, blocklist, client match, sentiment, sort)
 * 3. Renders the HTML body and, when asked, writes the OPML export
 * 4. Prints the HTML (dry run) or sends it over SMTP
 *
 * Failures surface as DigestError subclasses; the CLI maps them to exit codes.
 */

import { fetchItems } from '../adapters/freshrss';
import type { EnvironmentConfig } from '../config/environment';
import { sendDigestEmail } from '../delivery/mailer';
import { buildDigest, countItems } from '../digest/assemble';
import { buildEmailHtml, reportTitle } from '../render/email';
import { writeOpml } from '../render/opml';
import type { Digest, Roster } from '../types/digest';
import { logger as defaultLogger, type DigestLogger } from '../utils/logger';
import { subtractHours, toEpochSeconds } from '../utils/time';

export interface RunDigestOptions {
  config: EnvironmentConfig;
  hours?: number | null;
  dryRun?: boolean;
  opmlPath?: string | null;
  roster?: Roster;
}

export interface RunDigestDeps {
  fetchItems: typeof fetchItems;
  sendDigestEmail: typeof sendDigestEmail;
  writeOpml: typeof writeOpml;
  print: (text: string) => void;
  now: () => Date;
  logger: DigestLogger;
}

export interface RunDigestResult {
  digest: Digest;
  html: string;
  sent: boolean;
  messageId: string | null;
  opmlPath: string | null;
  duration: number;
}

const defaultDeps: RunDigestDeps = {
  fetchItems,
  sendDigestEmail,
  writeOpml,
  print: text => {
    process.stdout.write(text + '\n');
  },
  now: () => new Date(),
  logger: defaultLogger
};

export async function runDigest(options: RunDigestOptions, overrides: Partial<RunDigestDeps> = {}): Promise<RunDigestResult> {
  const deps: RunDigestDeps = { ...defaultDeps, ...overrides };
  const { config } = options;
  const log = deps.logger;
  const startTime = deps.now().getTime();

  const lookbackHours = options.hours ?? config.digest.lookbackHours;
  const oldestTimestamp = toEpochSeconds(subtractHours(deps.now(), lookbackHours));

  log.info(`Starting digest run (lookback ${lookbackHours}h, max ${config.digest.maxItems} items)`);

  // Step 1: Fetch
  const rawItems = await deps.fetchItems(
    {
      baseUrl: config.freshrss.baseUrl,
      username: config.freshrss.username,
      apiPassword: config.freshrss.apiPassword
    },
    {
      maxItems: config.digest.maxItems,
      oldestTimestamp,
      label: config.freshrss.label,
      logger: log
    }
  );

  // Step 2: Classify
  const digest = buildDigest(rawItems, {
    timeZone: config.digest.timeZone,
    roster: options.roster,
    blocklist: config.digest.blocklist,
    windowHours: lookbackHours,
    now: deps.now,
    logger: log
  });
  log.info(`Digest built: ${countItems(digest)} items across ${digest.groups.size} clients`, { stats: digest.stats });

  // Step 3: Render
  const html = buildEmailHtml(digest);

  if (options.opmlPath) {
    await deps.writeOpml(digest, options.opmlPath);
    log.info(`Wrote OPML export to ${options.opmlPath}`);
  }

  // Step 4: Deliver
  if (options.dryRun) {
    deps.print(html);
    return {
      digest,
      html,
      sent: false,
      messageId: null,
      opmlPath: options.opmlPath ?? null,
      duration: deps.now().getTime() - startTime
    };
  }

  const messageId = await deps.sendDigestEmail(
    config.smtp,
    {
      from: config.email.from,
      to: config.email.to,
      subject: reportTitle(digest.reportDate),
      html
    },
    log
  );

  return {
    digest,
    html,
    sent: true,
    messageId,
    opmlPath: options.opmlPath ?? null,
    duration: deps.now().getTime() - startTime
  };
}
