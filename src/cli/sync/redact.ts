// Matches the userinfo part of any scheme://user[:password]@ URL
const URL_CREDENTIALS_RE = /\b([a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/gi;

/**
 * Hide credentials embedded in remote URLs before they reach a log line
 */
export const redactCredentials = (text: string): string =>
  text.replace(URL_CREDENTIALS_RE, "$1***@");
