export {
	type ClickEvent,
	type CreateClickEventInput,
	type DeviceType,
	DEVICE_TYPES,
	createClickEvent,
	isClickEvent,
	isDeviceType,
	CLICK_IP_MAX_LENGTH,
	CLICK_USER_AGENT_MAX_LENGTH,
	CLICK_REFERER_MAX_LENGTH,
	CLICK_BROWSER_MAX_LENGTH,
} from './click-event.js';
