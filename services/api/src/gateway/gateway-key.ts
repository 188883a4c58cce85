/**
 * GATEWAY PUBLIC KEY - trust anchor for every gateway response.
 * Deployments set UPDATE_GATEWAY_KEY to the PEM their gateway signs with.
 */
export const DEFAULT_GATEWAY_PUBLIC_KEY = `-----BEGIN PUBLIC KEY-----
REPLACE_WITH_GATEWAY_PUBLIC_KEY
-----END PUBLIC KEY-----`; // REPLACE IN PRODUCTION
