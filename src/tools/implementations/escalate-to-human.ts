import { IntentToolDefinition } from '../types';

/** Hands the conversation to a human specialist; handled by the pipeline */
export const escalateToHumanTool: IntentToolDefinition = {
  kind: 'handoff',
  name: 'escalate_to_human',
  version: '1.0.0',
  description: 'Transferir la conversación a un especialista humano.',
  inputSchema: {
    type: 'object',
    properties: {
      reason: { type: 'string', minLength: 1, description: 'Razón de la transferencia' },
    },
    required: ['reason'],
    additionalProperties: false,
  },
  allowedAgents: ['SALES', 'SUPPORT', 'ROYALTIES'],
  allowedChannels: ['whatsapp', 'web'],
};
