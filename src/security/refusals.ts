import { RejectionReason } from './types';

/** Fixed user-facing refusals. Never generated by a model. */
const STATIC_REFUSALS: Record<RejectionReason, string> = {
  'rate-limited': 'Has enviado demasiados mensajes. Por favor espera un momento.',
  'prompt-injection': 'Lo siento, no puedo procesar ese tipo de mensaje.',
  'out-of-domain':
    'Hola! Solo puedo ayudarte con temas relacionados a distribución musical, regalías y lanzamientos. ¿En qué puedo asistirte?',
  'malicious-intent':
    'Lo siento, no puedo ayudarte con eso. ¿Tienes alguna consulta sobre nuestros servicios musicales?',
};

export function getRefusal(reason: RejectionReason): string {
  return STATIC_REFUSALS[reason];
}
