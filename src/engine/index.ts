import { DialogueDirector, type DirectorOptions } from './director';
import { ViewerChatSimulator } from './narrative-triggers';
import { DialogueSession, type DialogueSessionOptions } from './session';
import { logger } from '../shared/logger';
import { createRandom } from '../shared/random';
import type { PresentationCommand, PresentationResponse } from '../shared/messages';

export { DialogueDirector, type DirectorOptions } from './director';
export { DialogueSession, type DialogueSessionOptions } from './session';
export { NarrativeMemory, computeOverseerChance } from './narrative-memory';
export { NarrativeTriggers, ViewerChatSimulator, parseViewerCommand, resolveAmbience } from './narrative-triggers';
export { PersonaModel } from './persona-model';
export { PersonaRegistry } from './personas';
export { ReplyGenerator, TemplateRenderError } from './reply-generator';
export { Topic, TopicGraph } from './topic-graph';
export { ConversationThread, ThreadRegistry } from './conversation-thread';
export { formatDebugList, formatTranscriptLine } from '../shared/messages';
export type { PresentationCommand, PresentationResponse } from '../shared/messages';
export type * from '../shared/types';

export interface DialogueEngine {
  director: DialogueDirector;
  session: DialogueSession;
}

export interface DialogueEngineOptions extends DirectorOptions {
  session?: DialogueSessionOptions;
}

export function createDialogueEngine(options: DialogueEngineOptions = {}): DialogueEngine {
  const { session: sessionOptions, ...directorOptions } = options;
  const director = new DialogueDirector(directorOptions);
  if (director.settings.developerMode) {
    logger.setLevel('debug');
  }
  const { seed, viewerChat } = director.settings;
  const chat = viewerChat.enabled
    ? new ViewerChatSimulator(createRandom(seed === undefined ? undefined : `${seed}:viewers`), viewerChat)
    : undefined;
  const session = new DialogueSession(director, { viewerChat: chat, ...sessionOptions });
  return { director, session };
}

export function handlePresentationCommand(
  director: DialogueDirector,
  command: PresentationCommand
): PresentationResponse {
  switch (command.type) {
    case 'PRODUCE_NEXT':
      return { type: 'MESSAGE', message: director.produceNextMessage(command.now) };
    case 'ENQUEUE_USER_MESSAGE':
      return { type: 'ACK', accepted: director.enqueueUserMessage(command.username, command.text) };
    case 'REPORT_ACTIVITY':
      director.reportExternalActivity();
      return { type: 'ACK', accepted: true };
    case 'NOTIFY_CRISIS':
      director.notifyCrisisMode(command.enabled);
      return { type: 'ACK', accepted: true };
    case 'REQUEST_DEBUG_SNAPSHOT':
      return { type: 'DEBUG_SNAPSHOT', snapshot: director.getDebugSnapshot(), lines: director.getDebugLines() };
    case 'REQUEST_NARRATIVE_HISTORY':
      return { type: 'NARRATIVE_HISTORY', events: director.getNarrativeHistory(command.limit) };
    default: {
      logger.warn('[engine] Unknown presentation command', command);
      return { type: 'ACK', accepted: false };
    }
  }
}
