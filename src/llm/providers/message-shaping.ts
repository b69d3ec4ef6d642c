import { LLMMessage } from '../types';

export type DialogueRole = 'user' | 'assistant';

export interface DialogueTurn {
  role: DialogueRole;
  text: string;
}

export interface ShapedConversation {
  /** All system messages joined by a blank line, '' when none */
  system: string;
  /** Strictly alternating turns that open with the user */
  turns: DialogueTurn[];
}

const OPENER = '(inicio de la conversación)';

/**
 * Shape a chat transcript for APIs that take the system prompt apart and
 * reject two consecutive turns from the same side.
 */
export function shapeConversation(messages: LLMMessage[]): ShapedConversation {
  const system: string[] = [];
  const turns: DialogueTurn[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
      continue;
    }
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.text = `${last.text}\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, text: message.content });
    }
  }

  if (turns.length > 0 && turns[0].role !== 'user') {
    turns.unshift({ role: 'user', text: OPENER });
  }
  return { system: system.join('\n\n'), turns };
}
