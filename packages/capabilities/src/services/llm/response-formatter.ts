const EMOJI_PATTERN = /\p{Extended_Pictographic}(?:\u{FE0F})?/gu;
const MAX_SENTENCES = 5;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Clean a raw model reply into one chat-sized paragraph: drop any speaker
 * prefix the model echoed back, fold line breaks, cap at five sentences and
 * keep at most one emoji (the first).
 */
export function formatReply(raw: string, botName: string): string {
  let reply = raw.trim();
  if (!reply) return '...';

  const name = escapeRegExp(botName);
  reply = reply.replace(new RegExp(`^(?:You:|Your response as ${name}:|${name}:)\\s*`, 'i'), '');

  reply = reply
    .replace(/\n\s*\n/g, '\n')
    .replace(/([.!?])\s*\n/g, '$1 ')
    .replace(/\n/g, ' ')
    .replace(/ +/g, ' ')
    .trim();

  const sentences = reply.split(/(?<=[.!?])\s+/);
  if (sentences.length > MAX_SENTENCES) {
    reply = sentences.slice(0, MAX_SENTENCES).join(' ');
  }

  let seenEmoji = false;
  reply = reply
    .replace(EMOJI_PATTERN, (emoji) => {
      if (seenEmoji) return '';
      seenEmoji = true;
      return emoji;
    })
    .replace(/ {2,}/g, ' ')
    .trim();

  return reply || '...';
}
