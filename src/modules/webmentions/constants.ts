/**
 * Injection tokens for the Webmentions module
 */

export const WEBMENTIONS_CONFIG = Symbol('WEBMENTIONS_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const HTTP_TRANSPORT = Symbol('HTTP_TRANSPORT');
export const WEBMENTIONS_HANDLER = Symbol('WEBMENTIONS_HANDLER');
