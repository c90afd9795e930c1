/**
 * Unit tests for the end-to-end digest run
 */

import { createRawRecord, createTestEnv } from '../../__tests__/fixtures';
import { loadEnvironmentConfig } from '../../config/environment';
import { DeliveryError, FetchError, RenderError } from '../../utils/errors';
import { silentLogger } from '../../utils/logger';
import { runDigest, type RunDigestDeps } from '../run-digest';

const NOW = new Date('2025-07-15T12:00:00Z');

const createDeps = (items: unknown[] = []) => {
  const deps = {
    fetchItems: jest.fn<ReturnType<RunDigestDeps['fetchItems']>, Parameters<RunDigestDeps['fetchItems']>>(() => Promise.resolve(items)),
    sendDigestEmail: jest.fn<ReturnType<RunDigestDeps['sendDigestEmail']>, Parameters<RunDigestDeps['sendDigestEmail']>>(() =>
      Promise.resolve('<id@example.test>')
    ),
    writeOpml: jest.fn<ReturnType<RunDigestDeps['writeOpml']>, Parameters<RunDigestDeps['writeOpml']>>(() => Promise.resolve()),
    print: jest.fn<void, [string]>(),
    now: () => NOW,
    logger: silentLogger
  };
  return deps;
};

describe('runDigest', () => {
  const config = loadEnvironmentConfig(createTestEnv({ FRESHRSS_LABEL: 'PR', MAX_ITEMS: '200' }));

  it('should fetch the lookback window and send the rendered digest', async () => {
    const deps = createDeps([createRawRecord({ title: 'FOIL insurance reform update' })]);

    const result = await runDigest({ config }, deps);

    expect(deps.fetchItems).toHaveBeenCalledWith(
      { baseUrl: 'https://freshrss.example.test', username: 'digest', apiPassword: 'test-password' },
      { maxItems: 200, oldestTimestamp: 1752494400, label: 'PR', logger: silentLogger }
    );
    expect(result.sent).toBe(true);
    expect(result.messageId).toBe('<id@example.test>');
    expect(result.digest.groups.get('FOIL')).toHaveLength(1);

    const [smtp, email] = deps.sendDigestEmail.mock.calls[0];
    expect(smtp).toBe(config.smtp);
    expect(email).toEqual({
      from: 'digest@example.test',
      to: ['a@example.test', 'b@example.test'],
      subject: 'Daily PR Coverage — Tuesday, 15 July 2025',
      html: result.html
    });
    expect(deps.print).not.toHaveBeenCalled();
    expect(deps.writeOpml).not.toHaveBeenCalled();
  });

  it('should use the hours override for the window and the placeholder', async () => {
    const deps = createDeps();

    const result = await runDigest({ config, hours: 1.5, dryRun: true }, deps);

    expect(deps.fetchItems.mock.calls[0][1].oldestTimestamp).toBe(1752575400);
    expect(result.html).toContain('<p>No coverage found in the last 1.5 hours.</p>');
  });

  it('should print instead of sending on a dry run', async () => {
    const deps = createDeps();

    const result = await runDigest({ config, dryRun: true }, deps);

    expect(result.sent).toBe(false);
    expect(result.messageId).toBeNull();
    expect(deps.print).toHaveBeenCalledWith(result.html);
    expect(deps.sendDigestEmail).not.toHaveBeenCalled();
  });

  it('should write the OPML export when a path is given', async () => {
    const deps = createDeps();

    const result = await runDigest({ config, dryRun: true, opmlPath: '/tmp/coverage.opml' }, deps);

    expect(deps.writeOpml).toHaveBeenCalledWith(result.digest, '/tmp/coverage.opml');
    expect(result.opmlPath).toBe('/tmp/coverage.opml');
  });

  it('should stop before rendering when the fetch fails', async () => {
    const deps = createDeps();
    deps.fetchItems.mockRejectedValueOnce(new FetchError('FreshRSS API error: HTTP 500', 500));

    await expect(runDigest({ config }, deps)).rejects.toBeInstanceOf(FetchError);
    expect(deps.sendDigestEmail).not.toHaveBeenCalled();
  });

  it('should not send when the OPML export fails', async () => {
    const deps = createDeps();
    deps.writeOpml.mockRejectedValueOnce(new RenderError('Failed to write OPML: EACCES'));

    await expect(runDigest({ config, opmlPath: '/root/nope.opml' }, deps)).rejects.toThrow('Failed to write OPML: EACCES');
    expect(deps.sendDigestEmail).not.toHaveBeenCalled();
  });

  it('should surface delivery failures', async () => {
    const deps = createDeps();
    deps.sendDigestEmail.mockRejectedValueOnce(new DeliveryError('Failed to send email: timeout'));

    await expect(runDigest({ config }, deps)).rejects.toBeInstanceOf(DeliveryError);
  });
});
