import { IntentToolDefinition } from '../types';

export type TicketIssueType = 'metadata' | 'distribution' | 'royalties' | 'technical' | 'other';

/**
 * Opens a support ticket. The pipeline allocates the ticket reference,
 * writes the ticket to the outbox with the turn's commit and hands the
 * reference back to the agent as this tool's result.
 */
export const createSupportTicketTool: IntentToolDefinition = {
  kind: 'ticket',
  name: 'create_support_ticket',
  version: '1.0.0',
  description: 'Crear un ticket de soporte. Devuelve el número de ticket que debes citar al cliente.',
  inputSchema: {
    type: 'object',
    properties: {
      issue_type: { type: 'string', enum: ['metadata', 'distribution', 'royalties', 'technical', 'other'] },
      description: { type: 'string', minLength: 1, description: 'Descripción del problema' },
      priority: { type: 'string', enum: ['low', 'medium', 'high', 'critical'] },
    },
    required: ['issue_type', 'description'],
    additionalProperties: false,
  },
  allowedAgents: ['SUPPORT', 'ROYALTIES'],
  allowedChannels: ['whatsapp', 'web'],
};
