export type { DeleteAccountCommand } from './command.js';
export { createDeleteAccountUseCase, type DeleteAccountUseCaseDeps } from './use-case.js';
