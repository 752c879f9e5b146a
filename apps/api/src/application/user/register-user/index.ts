export type { RegisterUserCommand } from './command.js';
export { createRegisterUserUseCase, type RegisterUserUseCaseDeps } from './use-case.js';
