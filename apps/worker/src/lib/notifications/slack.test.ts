import { describe, it, expect, vi, afterEach } from 'vitest';
import { NotificationDeliveryError } from '@taskflow/runner';
import { SlackEscalationNotifier, buildSlackPayload } from './slack';

const silentLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

describe('buildSlackPayload', () => {
  it('should split the title from the body', () => {
    const payload = buildSlackPayload('room-1', '🤔 確認が必要です\n\n詳細です', 'delivery-1');

    expect(payload.channel).toBe('room-1');
    expect(payload.text).toBe('🤔 確認が必要です\n\n詳細です');
    expect(payload.blocks).toEqual([
      { type: 'header', text: { type: 'plain_text', text: '🤔 確認が必要です', emoji: true } },
      { type: 'section', text: { type: 'mrkdwn', text: '詳細です' } },
      { type: 'context', elements: [{ type: 'mrkdwn', text: '*配信ID:* delivery-1' }] },
    ]);
  });

  it('should omit the section for a single-line message', () => {
    const payload = buildSlackPayload('room-1', 'タイトルのみ', 'delivery-1');

    expect(payload.blocks.map((b) => b.type)).toEqual(['header', 'context']);
  });
});

describe('SlackEscalationNotifier', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post to the webhook and return a delivery id', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const notifier = new SlackEscalationNotifier({
      webhookUrl: 'https://hooks.example.test/webhook',
      logger: silentLogger,
    });

    const deliveryId = await notifier.send('room-1', 'タイトル\n本文');

    expect(deliveryId).toMatch(/^[0-9a-f-]{36}$/);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://hooks.example.test/webhook');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toMatchObject({ channel: 'room-1', text: 'タイトル\n本文' });
  });

  it('should throw NotificationDeliveryError on a non-OK response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('invalid_payload', { status: 400 })));
    const notifier = new SlackEscalationNotifier({
      webhookUrl: 'https://hooks.example.test/webhook',
      logger: silentLogger,
    });

    const error = await notifier.send('room-1', 'タイトル').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotificationDeliveryError);
    expect(error).toMatchObject({ code: 'NOTIFICATION_DELIVERY_FAILED', status: 400 });
  });

  it('should propagate network errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
    const notifier = new SlackEscalationNotifier({
      webhookUrl: 'https://hooks.example.test/webhook',
      logger: silentLogger,
    });

    await expect(notifier.send('room-1', 'タイトル')).rejects.toThrow('fetch failed');
  });
});
