const ASSISTANT_INSTRUCTIONS = `You are a personal assistant. You can:
- Add events to the user's Google Calendar
- Create notes in Apple Notes
- Compose and send Gmail emails
- Search the user's uploaded documents for answers
- Answer general questions

Use a tool when the request needs one (calendar, note, email, document search); otherwise answer in natural language.
Resolve relative dates such as "tomorrow" against the current time below and pass times to tools in ISO 8601 format.
When you answer from documents, mention which document the answer came from. Be concise.`;

function createFormatter(timezone: string): Intl.DateTimeFormat {
  const options: Intl.DateTimeFormatOptions = {
    weekday: 'long',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  };
  return new Intl.DateTimeFormat('en-US', { ...options, timeZone: timezone });
}

/** Formats `now` as `Friday, 2025-03-14 15:00` in the given IANA timezone. */
export function formatLocalTime(now: Date, timezone: string): string {
  const parts = new Map(
    createFormatter(timezone)
      .formatToParts(now)
      .map((part) => [part.type, part.value]),
  );
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.get(type) ?? '';

  return `${part('weekday')}, ${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}`;
}

export function buildSystemPrompt(now: Date, timezone: string): string {
  return `${ASSISTANT_INSTRUCTIONS}

Current time: ${formatLocalTime(now, timezone)} (${timezone})`;
}
