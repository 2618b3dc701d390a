import {toEmailMessage} from '../gmail.js';

function encode(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64url');
}

describe('toEmailMessage', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should read headers, plain text body and receive time', () => {
    const message = toEmailMessage({
      id: 'msg-1',
      threadId: 'thread-a',
      internalDate: '1704099600000',
      snippet: 'Lunch tomorrow',
      payload: {
        mimeType: 'multipart/alternative',
        headers: [
          {name: 'Subject', value: 'Lunch tomorrow?'},
          {name: 'From', value: 'sam@example.com'},
        ],
        parts: [
          {mimeType: 'text/plain', body: {data: encode('Lunch tomorrow at noon.')}},
          {mimeType: 'text/html', body: {data: encode('<p>Lunch tomorrow at noon.</p>')}},
        ],
      },
    });

    expect(message).toEqual({
      id: 'msg-1',
      threadId: 'thread-a',
      subject: 'Lunch tomorrow?',
      bodyText: 'Lunch tomorrow at noon.',
      headers: {subject: 'Lunch tomorrow?', from: 'sam@example.com'},
      receivedAt: new Date('2024-01-01T09:00:00Z'),
    });
  });

  it('should fall back to the Date header and the snippet', () => {
    const message = toEmailMessage({
      id: 'msg-2',
      threadId: 'thread-a',
      snippet: 'See you Friday',
      payload: {
        mimeType: 'text/html',
        headers: [{name: 'Date', value: 'Mon, 01 Jan 2024 10:30:00 +0000'}],
        body: {data: encode('<b>See you Friday</b>')},
      },
    });

    expect(message?.receivedAt).toEqual(new Date('2024-01-01T10:30:00Z'));
    expect(message?.bodyText).toBe('See you Friday');
    expect(message?.subject).toBe('');
  });

  it('should skip attachments', () => {
    const message = toEmailMessage({
      id: 'msg-3',
      threadId: 'thread-a',
      internalDate: '1704099600000',
      payload: {
        mimeType: 'multipart/mixed',
        parts: [
          {mimeType: 'text/plain', body: {data: encode('Agenda attached')}},
          {mimeType: 'text/plain', filename: 'notes.txt', body: {data: encode('secret notes')}},
        ],
      },
    });
    expect(message?.bodyText).toBe('Agenda attached');
  });

  it('should drop messages without ids or timestamps', () => {
    expect(toEmailMessage({id: 'msg-4'})).toBeNull();
    expect(toEmailMessage({id: 'msg-5', threadId: 'thread-a'})).toBeNull();
  });
});
