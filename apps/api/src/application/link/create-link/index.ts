export type { CreateLinkCommand } from './command.js';
export { createCreateLinkUseCase, type CreateLinkUseCaseDeps } from './use-case.js';
