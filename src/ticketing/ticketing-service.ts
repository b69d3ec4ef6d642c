import { env } from '../config/env';
import { TicketingService } from './types';
import { HelpDeskTicketingService } from './help-desk-ticketing';
import { MockTicketingService } from './mock-ticketing';
import { logger } from '../observability/logger';

export interface TicketingSettings {
  baseUrl: string;
  apiToken: string;
}

/**
 * Help desk client when both URL and token are set, otherwise the
 * in-memory desk. Production without a desk is logged loudly because
 * tickets then live only as long as the process.
 */
export function createTicketingService(
  settings: TicketingSettings = env.ticketing,
  now: () => number = Date.now,
): TicketingService {
  if (settings.baseUrl && settings.apiToken) {
    logger.info({ baseUrl: settings.baseUrl }, 'Ticketing: help desk');
    return new HelpDeskTicketingService(settings.baseUrl, settings.apiToken, now);
  }

  if (!env.isDev) logger.warn('Ticketing: no help desk configured; tickets are kept in memory');
  else logger.info('Ticketing: in-memory');
  return new MockTicketingService(now);
}
