export type { ConfirmPasswordResetCommand } from './command.js';
export { createConfirmPasswordResetUseCase, type ConfirmPasswordResetUseCaseDeps } from './use-case.js';
