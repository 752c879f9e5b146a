export type { UpdateLinkCommand } from './command.js';
export { createUpdateLinkUseCase, type UpdateLinkUseCaseDeps } from './use-case.js';
