/**
 * Encrypted-at-rest secrets for provider API keys.
 */

export { ENVELOPE_OVERHEAD, openEnvelope, sealEnvelope } from "./envelope.js";
export { formatSecrets, parseSecrets, type SecretRecords, secretKeyName } from "./records.js";
export { SecretBytes, type SecretBytesHandle, useSecret } from "./secret-bytes.js";
export {
	getSecret,
	listSecretNames,
	removeSecret,
	type SecretsLocation,
	setSecret,
} from "./store.js";
export {
	decryptSecrets,
	decryptToZeroizable,
	encryptSecrets,
	SECRETS_FILE_NAME,
	secretsExist,
	secretsFilePath,
	withDecryptedSecrets,
} from "./vault.js";
