/**
 * Parses a `Cookie` request header (`a=1; b=2`) into an ordered map.
 * A repeated name keeps its first position and its last value.
 */
export const parseCookieHeader = (value: string): Map<string, string> => {
  const cookies = new Map<string, string>();

  for (const part of value.split(';')) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf('=');
    if (separator === -1) {
      cookies.set(trimmed, '');
      continue;
    }

    const name = trimmed.slice(0, separator).trim();
    const cookieValue = trimmed.slice(separator + 1).trim();
    cookies.set(name, cookieValue);
  }

  return cookies;
};

export const formatCookieHeader = (cookies: Map<string, string>): string => {
  return Array.from(cookies, ([name, value]) => `${name}=${value}`).join('; ');
};
