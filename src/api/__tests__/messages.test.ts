import {parseMessagePayload} from '../messages.js';

describe('parseMessagePayload', () => {
  it('should turn a valid body into an EmailMessage', () => {
    const parsed = parseMessagePayload({
      id: 'msg-1',
      threadId: 'thread-a',
      bodyText: 'Lunch tomorrow at noon',
      receivedAt: '2024-01-01T09:00:00Z',
    });

    expect(parsed).toEqual({
      ok: true,
      message: {
        id: 'msg-1',
        threadId: 'thread-a',
        subject: '',
        bodyText: 'Lunch tomorrow at noon',
        headers: {},
        receivedAt: new Date('2024-01-01T09:00:00Z'),
      },
    });
  });

  it('should accept an offset timestamp', () => {
    const parsed = parseMessagePayload({
      id: 'msg-1',
      threadId: 'thread-a',
      bodyText: '',
      receivedAt: '2024-01-01T03:00:00-06:00',
    });
    expect(parsed.ok && parsed.message.receivedAt.toISOString()).toBe('2024-01-01T09:00:00.000Z');
  });

  it('should list what is wrong with an invalid body', () => {
    const parsed = parseMessagePayload({id: '', bodyText: 'x', receivedAt: 'yesterday'});
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.issues).toHaveLength(3);
    expect(parsed.issues[0]).toMatch(/^id: /);
    expect(parsed.issues[1]).toMatch(/^threadId: /);
    expect(parsed.issues[2]).toMatch(/^receivedAt: /);
  });
});
