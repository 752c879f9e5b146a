export type { RequestPasswordResetCommand } from './command.js';
export { createRequestPasswordResetUseCase, type RequestPasswordResetUseCaseDeps } from './use-case.js';
