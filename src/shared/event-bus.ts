/**
 * Event Bus factory
 */

import { SimpleEventBus } from './events.ts';
import type { EventBus } from './events.ts';

export const createEventBus = (): EventBus => {
  return new SimpleEventBus();
};
