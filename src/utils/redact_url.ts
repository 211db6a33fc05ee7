import { URL } from 'node:url';

/**
 * Formats a proxy URL for logs and error messages, with the password replaced.
 */
export const redactUrl = (url: string | URL, passwordReplacement = '<redacted>'): string => {
    const { href, password } = typeof url === 'object' ? url : new URL(url);

    return password ? href.replace(`:${password}@`, `:${passwordReplacement}@`) : href;
};
