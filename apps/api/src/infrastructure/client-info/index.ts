export { getClientIp, FALLBACK_CLIENT_IP } from './client-ip.js';
export { parseUserAgent, type UserAgentInfo } from './user-agent.js';
export { openGeoIpResolver, nullGeoIpResolver, type GeoIpResolver } from './geoip.js';
