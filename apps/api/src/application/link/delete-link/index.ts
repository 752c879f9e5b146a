export type { DeleteLinkCommand } from './command.js';
export { createDeleteLinkUseCase, type DeleteLinkUseCaseDeps } from './use-case.js';
