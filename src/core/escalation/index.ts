export { needsEscalation, findEscalationTriggers, ESCALATION_TRIGGERS } from './gate.js';
export type { EscalationTrigger } from './gate.js';
