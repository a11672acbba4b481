export type { CdpKey, RequestJwtInput } from "./types.js";
export { Credentials, createCredentials, unwrapCredentials } from "./credentials.js";
export { buildRequestJwt, createNonce } from "./jwt.js";
