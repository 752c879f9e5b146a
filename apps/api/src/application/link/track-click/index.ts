export type { TrackClickCommand, VisitorDetails } from './command.js';
export { createTrackClickUseCase, type TrackClickUseCaseDeps } from './use-case.js';
