export { validateClientId, MAX_CLIENT_ID_LENGTH } from './client-id.js';
