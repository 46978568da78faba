import { describe, it, expect, vi, beforeEach } from 'vitest';

const { launch, connectOverCDP } = vi.hoisted(() => ({
  launch: vi.fn(async () => ({ kind: 'local' })),
  connectOverCDP: vi.fn(async () => ({ kind: 'remote' })),
}));

vi.mock('playwright', () => ({ chromium: { launch, connectOverCDP } }));

import { createBrowser } from '../src/scraper/base';

beforeEach(() => {
  launch.mockClear();
  connectOverCDP.mockClear();
});

describe('createBrowser', () => {
  it('launches Chromium without Playwright signal handlers', async () => {
    await createBrowser({ headless: true, cdpUrl: null });

    expect(launch).toHaveBeenCalledTimes(1);
    expect(launch).toHaveBeenCalledWith(
      expect.objectContaining({
        headless: true,
        handleSIGINT: false,
        handleSIGTERM: false,
        handleSIGHUP: false,
      })
    );
    expect(connectOverCDP).not.toHaveBeenCalled();
  });

  it('connects over CDP when a remote browser is configured', async () => {
    await createBrowser({ headless: false, cdpUrl: 'ws://127.0.0.1:9222' });

    expect(connectOverCDP).toHaveBeenCalledWith('ws://127.0.0.1:9222');
    expect(launch).not.toHaveBeenCalled();
  });
});
