import { createTelegramAlerts, formatAlert } from './telegram.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('formatAlert', () => {
  it('prefixes the level and escapes HTML', () => {
    expect(formatAlert('a < b & c', 'warning')).toBe('⚠️ <b>WARNING</b>\na &lt; b &amp; c');
    expect(formatAlert('render down', 'critical')).toBe('🚨 <b>CRITICAL</b>\nrender down');
  });
});

describe('createTelegramAlerts', () => {
  it('sends nothing without credentials', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await createTelegramAlerts({ botToken: 'test-token' }).alert('hello');

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts an HTML message to the bot API', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await createTelegramAlerts({ botToken: 'test-token', chatId: '42' }).alert('Upload failed', 'critical');

    expect(fetchMock).toHaveBeenCalledWith('https://api.telegram.org/bottest-token/sendMessage', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: '42', text: '🚨 <b>CRITICAL</b>\nUpload failed', parse_mode: 'HTML' }),
      signal: expect.any(AbortSignal),
    });
  });

  it('bounds every send with a live abort signal', async () => {
    const seen: { signal?: AbortSignal | null } = {};
    vi.stubGlobal('fetch', vi.fn(async (_url: string, init?: RequestInit) => {
      seen.signal = init?.signal;
      return new Response('{"ok":true}', { status: 200 });
    }));

    await createTelegramAlerts({ botToken: 'test-token', chatId: '42' }).alert('hi');

    expect(seen.signal).toBeInstanceOf(AbortSignal);
    expect(seen.signal?.aborted).toBe(false);
  });

  it('gives up quietly when the send times out', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError')));

    await expect(createTelegramAlerts({ botToken: 'test-token', chatId: '42' }).alert('x')).resolves.toBeUndefined();
  });

  it('defaults to the info level', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await createTelegramAlerts({ botToken: 'test-token', chatId: '42' }).alert('hi');

    expect(fetchMock).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({ body: JSON.stringify({ chat_id: '42', text: 'ℹ️ <b>INFO</b>\nhi', parse_mode: 'HTML' }) }),
    );
  });

  it('never throws when Telegram is down or refuses', async () => {
    const alerts = createTelegramAlerts({ botToken: 'test-token', chatId: '42' });

    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('fetch failed')));
    await expect(alerts.alert('x')).resolves.toBeUndefined();

    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('Unauthorized', { status: 401 })));
    await expect(alerts.alert('x')).resolves.toBeUndefined();
  });
});
