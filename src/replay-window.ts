import { ChatMessage, Mention } from './types';

export interface ReplayWindow {
  communityId: string;
  invokingUserId: string;
  messages: ChatMessage[];
}

function parseMention(raw: unknown): Mention {
  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('userId' in raw) ||
    !('displayName' in raw) ||
    typeof raw.userId !== 'string' ||
    typeof raw.displayName !== 'string'
  ) {
    throw new Error('mention needs string "userId" and "displayName"');
  }
  const isBot = 'isBot' in raw && raw.isBot === true;
  return { userId: raw.userId, displayName: raw.displayName, isBot };
}

function parseMessage(raw: unknown, index: number): ChatMessage {
  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('authorId' in raw) ||
    !('content' in raw) ||
    !('createdAt' in raw) ||
    typeof raw.authorId !== 'string' ||
    typeof raw.content !== 'string' ||
    typeof raw.createdAt !== 'string'
  ) {
    throw new Error(`message ${index} needs string "authorId", "content" and "createdAt"`);
  }

  const createdAt = new Date(raw.createdAt);
  if (Number.isNaN(createdAt.getTime())) {
    throw new Error(`message ${index} has an invalid "createdAt": ${raw.createdAt}`);
  }

  const authorName = 'authorName' in raw && typeof raw.authorName === 'string' ? raw.authorName : '';
  const channelId = 'channelId' in raw && typeof raw.channelId === 'string' ? raw.channelId : 'default';
  const mentions = 'mentions' in raw && Array.isArray(raw.mentions) ? raw.mentions.map(parseMention) : [];

  return {
    authorId: raw.authorId,
    authorName,
    authorIsBot: 'authorIsBot' in raw && raw.authorIsBot === true,
    content: raw.content,
    createdAt,
    channelId,
    mentions,
  };
}

export function parseReplayWindow(raw: unknown): ReplayWindow {
  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('communityId' in raw) ||
    !('invokingUserId' in raw) ||
    !('messages' in raw) ||
    typeof raw.communityId !== 'string' ||
    typeof raw.invokingUserId !== 'string' ||
    !Array.isArray(raw.messages)
  ) {
    throw new Error('window file needs "communityId", "invokingUserId" and a "messages" array');
  }

  const messages = raw.messages
    .map((message: unknown, index: number) => parseMessage(message, index))
    .sort((a: ChatMessage, b: ChatMessage) => a.createdAt.getTime() - b.createdAt.getTime());

  return { communityId: raw.communityId, invokingUserId: raw.invokingUserId, messages };
}
