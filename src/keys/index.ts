export {
	ensureKeyFile,
	type EnsureKeyResult,
	generateKeyFile,
	generateKeyPair,
	KEY_FILE_NAME,
	type KeyPair,
	keyFilePath,
	loadIdentity,
	loadKeyPair,
	loadRecipient,
} from "./key-file.js";
export {
	backupKeyPath,
	type RotateKeyOptions,
	type RotationResult,
	type RotationState,
	rotateKey,
} from "./rotate.js";
