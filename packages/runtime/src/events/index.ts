// Area events
export { EventBus, ALL_AREAS } from './bus.js';
export {
  isEventOfType,
  type AreaEvent,
  type AreaEventHandler,
  type AreaEventPayloads,
  type AreaEventType,
} from './types.js';
