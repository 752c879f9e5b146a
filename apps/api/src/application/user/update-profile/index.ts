export type { UpdateProfileCommand } from './command.js';
export { createUpdateProfileUseCase, type UpdateProfileUseCaseDeps } from './use-case.js';
