export { tracingPlugin } from './tracing.js';
export {
	authenticationPlugin,
	principalIdOf,
	requireAuthHook,
	type AuthenticationPluginOptions,
	type RequireAuthOptions,
} from './authentication.js';
export { executionContextPlugin, ANONYMOUS_PRINCIPAL } from './execution-context.js';
