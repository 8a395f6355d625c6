export { BaseAppError } from "./BaseAppError";
export type { ErrorMeta } from "./BaseAppError";
export { ValidationErrors } from "./validation-errors";
export { AuthErrors } from "./auth-errors";
export { LLMErrors } from "./llm-errors";
export { SignalErrors, isInvalidSignalError } from "./signal-errors";
export type { InvalidSignalError } from "./signal-errors";
export { StoreErrors } from "./store-errors";
export { MembershipErrors } from "./membership-errors";
export { ProfileErrors } from "./profile-errors";
export { ConfigErrors } from "./config-errors";
