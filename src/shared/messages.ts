import type { DialogueMessage, DirectorSnapshot, NarrativeEvent } from './types';

export type PresentationCommand =
  | {
      type: 'PRODUCE_NEXT';
      now?: number;
    }
  | {
      type: 'ENQUEUE_USER_MESSAGE';
      username: string;
      text: string;
    }
  | {
      type: 'REPORT_ACTIVITY';
    }
  | {
      type: 'NOTIFY_CRISIS';
      enabled: boolean;
    }
  | {
      type: 'REQUEST_DEBUG_SNAPSHOT';
    }
  | {
      type: 'REQUEST_NARRATIVE_HISTORY';
      limit?: number;
    };

export type PresentationResponse =
  | {
      type: 'MESSAGE';
      message: DialogueMessage | null;
    }
  | {
      type: 'ACK';
      accepted: boolean;
    }
  | {
      type: 'DEBUG_SNAPSHOT';
      snapshot: DirectorSnapshot;
      lines: string[];
    }
  | {
      type: 'NARRATIVE_HISTORY';
      events: NarrativeEvent[];
    };

export function formatDebugList(lines: readonly string[]): string {
  return lines
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, index) => `${index + 1}. ${line}`)
    .join('\n');
}

export function formatTranscriptLine(message: DialogueMessage, origin = 0): string {
  const elapsedSeconds = Math.max(0, Math.floor((message.createdAt - origin) / 1000));
  const minutes = String(Math.floor(elapsedSeconds / 60)).padStart(2, '0');
  const seconds = String(elapsedSeconds % 60).padStart(2, '0');
  const speaker = message.kind === 'user' ? `<${message.speaker}>` : message.speaker;
  return `[${minutes}:${seconds}] ${speaker}: ${message.text.trim()}`;
}
