import Ajv from 'ajv';
import { AgentId, isAgentId } from '../config/types';
import { AgentOutcome } from './types';

/** Raw JSON every agent generation must return */
export interface AgentContract {
  user_facing_message: string;
  tool_calls: Array<{ name: string; args: Record<string, unknown> }>;
  handoff_to: string | null;
  escalation_reason: string | null;
}

/**
 * JSON Schema for the agent response contract.
 * The LLM is instructed to return JSON matching this schema.
 */
export const RESPONSE_CONTRACT_SCHEMA = {
  type: 'object',
  properties: {
    user_facing_message: {
      type: 'string',
      description: 'Mensaje para el cliente. Puede ir vacío solo si escalas o transfieres.',
    },
    tool_calls: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          args: { type: 'object', additionalProperties: true },
        },
        required: ['name', 'args'],
      },
      description: 'Herramientas a ejecutar. El orquestador las ejecuta y te devuelve los resultados.',
    },
    handoff_to: {
      type: ['string', 'null'],
      enum: ['SALES', 'SUPPORT', 'ROYALTIES', 'HUMAN', null],
      description: 'Agente al que transferir la conversación, o null.',
    },
    escalation_reason: {
      type: ['string', 'null'],
      description: 'Motivo para escalar a un especialista humano, o null.',
    },
  },
  required: ['user_facing_message', 'tool_calls', 'handoff_to', 'escalation_reason'],
} as const;

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateContract = ajv.compile<AgentContract>(RESPONSE_CONTRACT_SCHEMA);

export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolation';
  }
}

/** Strip markdown fences some models wrap JSON in */
export function stripFences(raw: string): string {
  let jsonStr = raw.trim();
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
  }
  return jsonStr;
}

export function parseContract(raw: string): AgentContract {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripFences(raw));
  } catch {
    throw new ContractViolation('Agent response is not valid JSON');
  }
  if (!validateContract(parsed)) {
    const errors = validateContract.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new ContractViolation(`Agent response violates contract: ${errors}`);
  }
  return parsed;
}

/**
 * Map a parsed contract onto exactly one AgentOutcome. Precedence:
 * escalation, then handoff, then tools, then a plain reply.
 */
export function toAgentOutcome(contract: AgentContract, current: AgentId): AgentOutcome {
  const text = contract.user_facing_message.trim();
  // Strip "functions." prefix if the model adds it
  const toolRequests = contract.tool_calls.map((tc) => ({
    name: tc.name.replace(/^functions\./, ''),
    args: tc.args,
  }));

  const escalateCall = toolRequests.find((tc) => tc.name === 'escalate_to_human');
  const escalationReason =
    contract.escalation_reason?.trim() ||
    (escalateCall ? String(escalateCall.args.reason ?? 'solicitud del agente') : '');
  if (escalationReason) {
    return { kind: 'escalation', reason: escalationReason, text };
  }

  if (contract.handoff_to && isAgentId(contract.handoff_to) && contract.handoff_to !== current) {
    return { kind: 'handoff', target: contract.handoff_to, text, reason: 'agent_request' };
  }

  if (toolRequests.length > 0) {
    return { kind: 'reply_with_tool', text, toolRequests };
  }

  if (!text) {
    throw new ContractViolation('Agent produced no user-facing message');
  }
  return { kind: 'reply', text };
}
