/**
 * Static Fallback Responses
 *
 * Pre-written replies used when generation is unavailable, keyed by the
 * agent holding the conversation and the failure class.
 */

import { AgentId } from '../config/types';
import { FailureClass } from './errors';

type FallbackTable = Record<AgentId, Record<Exclude<FailureClass, 'version_conflict'>, string>>;

const STATIC_RESPONSES: FallbackTable = {
  SALES: {
    timeout: 'Estoy tardando más de lo normal en consultar nuestros planes. Un asesor comercial revisará tu consulta y te responderá en breve.',
    error: 'En este momento no puedo acceder a la información de planes y precios. Ya registramos tu consulta y un asesor comercial te contactará pronto.',
  },
  SUPPORT: {
    timeout: 'Nuestro sistema de soporte está respondiendo lento. Registramos tu caso y un especialista técnico lo revisará en breve.',
    error: 'Tenemos un inconveniente técnico temporal. Tu caso ya fue registrado y un especialista de soporte te contactará pronto.',
  },
  ROYALTIES: {
    timeout: 'La consulta de regalías está tardando más de lo esperado. Un especialista de regalías revisará tu pregunta y te responderá.',
    error: 'No pude acceder a la información de regalías en este momento. Registramos tu consulta y el equipo de regalías te contactará.',
  },
  HUMAN: {
    timeout: 'Tu mensaje fue recibido. Un especialista de nuestro equipo te responderá lo antes posible.',
    error: 'Tu mensaje fue recibido. Un especialista de nuestro equipo te responderá lo antes posible.',
  },
};

const CONFLICT_APOLOGY =
  'Lo sentimos, no pudimos procesar tu mensaje en este momento. Un especialista revisará tu conversación y te responderá en breve.';

export function getStaticFallback(agent: AgentId, failureClass: FailureClass): string {
  if (failureClass === 'version_conflict') return CONFLICT_APOLOGY;
  return STATIC_RESPONSES[agent][failureClass];
}

/** Reply while a human specialist holds the conversation */
export function getHumanHoldingMessage(ticketRef?: string): string {
  return ticketRef
    ? `Tu mensaje fue agregado a tu caso ${ticketRef}. Un especialista de nuestro equipo te responderá lo antes posible.`
    : STATIC_RESPONSES.HUMAN.timeout;
}

/** Line appended to replies that opened a ticket */
export function getTicketNotice(ticketRef: string, escalatedToHuman: boolean): string {
  return escalatedToHuman
    ? `Hemos transferido tu caso a un especialista. Número de ticket: ${ticketRef}.`
    : `Número de ticket: ${ticketRef}.`;
}
