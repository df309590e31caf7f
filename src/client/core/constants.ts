export const DEFAULT_PORT = 50000;

// (1024 * 8) - 2, the server's block buffer minus the header
export const MAX_BLOCK_SIZE = 8190;

export const MAX_REDIRECTS = 10;

export const config = {
  control: {
    username: "monetdb",
    database: "merovingian",
    language: "control",
  },
  // clients that talk to the local daemon without an fd to pass announce it with this byte
  unixSocketHandshake: "0",
  endianness: "BIG",
} as const;

export function monetdbSocketPath(port: number): string {
  return `/tmp/.s.monetdb.${port}`;
}

export function merovingianSocketPath(port: number): string {
  return `/tmp/.s.merovingian.${port}`;
}

/**
 * First characters of server replies
 */
export const Message = {
  PROMPT: "",
  MORE: "\x01\x02\n",
  INFO: "#",
  ERROR: "!",
  QUERY: "&",
  HEADER: "%",
  TUPLE: "[",
  REDIRECT: "^",
  OK: "=OK",
} as const;

export const REDIRECT_PREFIX = {
  proxy: "^mapi:merovingian:",
  monetdb: "^mapi:monetdb:",
} as const;
