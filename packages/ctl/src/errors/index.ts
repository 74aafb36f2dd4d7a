export { CtlError } from "./ctl-error.js";
export { NegotiationError } from "./negotiation-error.js";
export { TransportError } from "./transport-error.js";
export { UsageError } from "./usage-error.js";
