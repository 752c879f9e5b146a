export {
	createAuthService,
	type AuthService,
	type AuthServiceDeps,
	type AccessToken,
	type CurrentUserResolution,
} from './auth-service.js';
