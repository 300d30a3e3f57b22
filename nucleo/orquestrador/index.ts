export { ActionGate, ActionGateContext, ActionGateInput, ActionGateOutcome, ActionGateResult } from './ActionGate';
