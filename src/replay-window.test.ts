import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { parseReplayWindow } from './replay-window';

const SAMPLE_PATH = path.resolve(__dirname, '../fixtures/sample-window.json');

describe('parseReplayWindow', () => {
  it('reads the sample window', () => {
    const window = parseReplayWindow(JSON.parse(fs.readFileSync(SAMPLE_PATH, 'utf-8')));

    expect(window.communityId).toBe('community-demo');
    expect(window.invokingUserId).toBe('user-invoker');
    expect(window.messages).toHaveLength(9);
    expect(window.messages[2].mentions).toEqual([{ userId: 'user-ada', displayName: 'Ada', isBot: false }]);
    expect(window.messages[3].authorIsBot).toBe(true);
    expect(window.messages[0].createdAt.toISOString()).toBe('2026-10-18T18:00:00.000Z');
  });

  it('orders messages oldest first and fills optional fields', () => {
    const window = parseReplayWindow({
      communityId: 'c1',
      invokingUserId: 'me',
      messages: [
        { authorId: 'b', content: 'second', createdAt: '2026-01-01T00:02:00Z' },
        { authorId: 'a', content: 'first', createdAt: '2026-01-01T00:01:00Z' },
      ],
    });

    expect(window.messages.map(entry => entry.authorId)).toEqual(['a', 'b']);
    expect(window.messages[0]).toMatchObject({ authorName: '', authorIsBot: false, channelId: 'default', mentions: [] });
  });

  it('rejects a bad timestamp', () => {
    expect(() =>
      parseReplayWindow({
        communityId: 'c1',
        invokingUserId: 'me',
        messages: [{ authorId: 'a', content: 'hi', createdAt: 'yesterday-ish' }],
      })
    ).toThrow('message 0 has an invalid "createdAt": yesterday-ish');
  });

  it('rejects a file without messages', () => {
    expect(() => parseReplayWindow({ communityId: 'c1' })).toThrow(
      'window file needs "communityId", "invokingUserId" and a "messages" array'
    );
  });
});
