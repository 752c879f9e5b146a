export type { ChangePasswordCommand } from './command.js';
export { createChangePasswordUseCase, type ChangePasswordUseCaseDeps } from './use-case.js';
