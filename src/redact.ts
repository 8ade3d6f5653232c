const CREDENTIAL_RE = /^(https?:\/\/)([^@/]+)@/i;

export const redactUrl = (url: string) => {
	// Redact any credentials before @ in HTTP(S) URLs
	return url.replace(CREDENTIAL_RE, "$1***@");
};

const TRAILING_SLASHES_RE = /\/+$/;

export const normalizeBaseUrl = (url: string) =>
	url.trim().replace(TRAILING_SLASHES_RE, "");
