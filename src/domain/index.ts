export type { SimulationEvent, EventData, EventHandler } from './event.js';
export { EventPriority, SimulationEventType } from './event.js';
