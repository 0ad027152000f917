/**
 * Redirect templates
 *
 * Route paths and program redirects may contain a `{{query}}` placeholder.
 * The residual arguments are percent-encoded before substitution.
 */

const QUERY_PLACEHOLDER = /\{\{\s*query\s*\}\}/g;

/**
 * Characters escaped on top of controls and non-ASCII: the URL fragment
 * percent-encode set, plus `+` (read as a space in queries), `&` (query
 * separator) and `#` (fragment start).
 */
const FRAGMENT_ENCODE_SET = new Set([" ", '"', "<", ">", "`", "+", "&", "#"]);

export function encodeQueryArgs(args: string): string {
  let encoded = "";
  for (const char of args) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x20 || code >= 0x7f || FRAGMENT_ENCODE_SET.has(char)) {
      for (const byte of Buffer.from(char, "utf-8")) {
        encoded += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
      }
    } else {
      encoded += char;
    }
  }
  return encoded;
}

/**
 * Substitute the encoded `args` for every `{{query}}` in `template`.
 */
export function renderTemplate(template: string, args: string): string {
  const query = encodeQueryArgs(args);
  return template.replace(QUERY_PLACEHOLDER, () => query);
}
