export const PROTOCOL_VERSION = '0.1.0';

/** WebSocket close codes the relay uses. */
export const CLOSE_CODES = {
  NORMAL: 1000,
  SHUTDOWN: 1001,
  PROTOCOL_VIOLATION: 1008,
  /** A newer ANNOUNCE for the same address took over. */
  SUPERSEDED: 4000,
} as const;

export type SocketRole = 'announce' | 'input' | 'lookup';

export const SOCKET_ROLES: readonly SocketRole[] = ['announce', 'input', 'lookup'];

export const ENDPOINT_PATHS: Record<SocketRole, string> = {
  announce: '/ws/announce',
  input: '/ws/input',
  lookup: '/ws/lookup',
};

export function roleFromPath(pathname: string): SocketRole | null {
  const trimmed = pathname.replace(/\/+$/, '');
  return SOCKET_ROLES.find((role) => ENDPOINT_PATHS[role] === trimmed) ?? null;
}

/**
 * Endpoint URL for one socket role. The base may already end in any of the
 * endpoint paths; that suffix is replaced.
 */
export function endpointUrl(relayUrl: string, role: SocketRole): string {
  return `${relayBaseUrl(relayUrl)}${ENDPOINT_PATHS[role]}`;
}

/** Relay URL without a trailing slash or endpoint path. */
export function relayBaseUrl(relayUrl: string): string {
  return relayUrl.replace(/\/+$/, '').replace(/\/ws\/(?:announce|input|lookup)$/, '');
}
