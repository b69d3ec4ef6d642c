import { ContractViolation, parseContract, stripFences, toAgentOutcome } from '../../src/agent/response-contract';
import { contract } from '../helpers/fakes';

describe('parseContract', () => {
  it('should parse a contract wrapped in markdown fences', () => {
    const raw = '```json\n' + contract({ message: 'Hola' }) + '\n```';

    expect(stripFences(raw)).toBe(contract({ message: 'Hola' }));
    expect(parseContract(raw)).toEqual({
      user_facing_message: 'Hola',
      tool_calls: [],
      handoff_to: null,
      escalation_reason: null,
    });
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseContract('Claro, te ayudo con eso')).toThrow(
      new ContractViolation('Agent response is not valid JSON'),
    );
  });

  it('should reject JSON missing required fields', () => {
    expect(() => parseContract(JSON.stringify({ user_facing_message: 'Hola' }))).toThrow(ContractViolation);
  });

  it('should reject an unknown handoff target', () => {
    expect(() => parseContract(JSON.stringify({
      user_facing_message: 'Hola',
      tool_calls: [],
      handoff_to: 'BILLING',
      escalation_reason: null,
    }))).toThrow(/violates contract/);
  });
});

describe('toAgentOutcome', () => {
  it('should prefer escalation over every other outcome', () => {
    const outcome = toAgentOutcome(
      parseContract(contract({
        message: 'Te paso con una persona.',
        handoff: 'SUPPORT',
        tools: [{ name: 'get_pricing', args: {} }],
        escalation: 'amenaza legal',
      })),
      'SALES',
    );

    expect(outcome).toEqual({ kind: 'escalation', reason: 'amenaza legal', text: 'Te paso con una persona.' });
  });

  it('should treat an escalate_to_human tool call as escalation', () => {
    const outcome = toAgentOutcome(
      parseContract(contract({ tools: [{ name: 'functions.escalate_to_human', args: { reason: 'cliente molesto' } }] })),
      'SUPPORT',
    );

    expect(outcome).toEqual({ kind: 'escalation', reason: 'cliente molesto', text: '' });
  });

  it('should prefer a handoff over tool requests', () => {
    const outcome = toAgentOutcome(
      parseContract(contract({ handoff: 'ROYALTIES', tools: [{ name: 'check_release_status', args: {} }] })),
      'SUPPORT',
    );

    expect(outcome).toEqual({ kind: 'handoff', target: 'ROYALTIES', text: '', reason: 'agent_request' });
  });

  it('should ignore a handoff to the current agent', () => {
    const outcome = toAgentOutcome(
      parseContract(contract({ message: 'Revisando…', handoff: 'SUPPORT', tools: [{ name: 'check_release_status', args: { release_id: 'REL-1' } }] })),
      'SUPPORT',
    );

    expect(outcome).toEqual({
      kind: 'reply_with_tool',
      text: 'Revisando…',
      toolRequests: [{ name: 'check_release_status', args: { release_id: 'REL-1' } }],
    });
  });

  it('should return a plain reply', () => {
    expect(toAgentOutcome(parseContract(contract({ message: '  Hola  ' })), 'SALES')).toEqual({
      kind: 'reply',
      text: 'Hola',
    });
  });

  it('should reject a plain reply with no text', () => {
    expect(() => toAgentOutcome(parseContract(contract({ message: '   ' })), 'SALES')).toThrow(
      'Agent produced no user-facing message',
    );
  });
});
