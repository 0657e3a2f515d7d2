import { StringDecoder } from 'node:string_decoder';

export interface TruncatedOutput {
  text: string;
  truncated: boolean;
}

export interface OutputCollector {
  push: (chunk: Buffer) => void;
  finish: () => TruncatedOutput;
}

export function truncateOutput(text: string, maxChars: number): TruncatedOutput {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: withMarker(text.slice(0, maxChars), text.length - maxChars), truncated: true };
}

/**
 * Decodes a UTF-8 stream chunk by chunk, keeping at most `maxChars`
 * characters and counting the rest. Produces the same text as
 * `truncateOutput` over the whole stream.
 */
export function createOutputCollector(maxChars: number): OutputCollector {
  const decoder = new StringDecoder('utf8');
  let kept = '';
  let removed = 0;

  function append(text: string): void {
    const room = Math.max(maxChars - kept.length, 0);
    if (text.length <= room) {
      kept += text;
      return;
    }
    kept += text.slice(0, room);
    removed += text.length - room;
  }

  return {
    push(chunk: Buffer): void {
      append(decoder.write(chunk));
    },

    finish(): TruncatedOutput {
      append(decoder.end());
      if (removed === 0) {
        return { text: kept, truncated: false };
      }
      return { text: withMarker(kept, removed), truncated: true };
    },
  };
}

function withMarker(kept: string, removed: number): string {
  return `${kept}\n\n[Truncated: ${removed} characters removed]`;
}
