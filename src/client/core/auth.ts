/**
 * Challenge-response login for MAPI
 */
import { createHash } from "crypto";
import { config } from "./constants";
import { NotSupportedError, OperationalError } from "./errors";

export interface Challenge {
  salt: string;
  identity: string;
  protocol: string;
  hashes: string[];
  endian: string;
  /**
   * Password pre-hash algorithm, protocol 9 only
   */
  algorithm?: string;
}

export interface Credentials {
  username: string;
  password: string;
  language: string;
  database: string;
}

// strongest first
const HASH_PREFERENCE = ["SHA512", "SHA384", "SHA256", "SHA224", "SHA1", "MD5"] as const;

type HashName = (typeof HASH_PREFERENCE)[number];

function isSupportedHash(name: string): name is HashName {
  return HASH_PREFERENCE.some((hash) => hash === name);
}

function hexDigest(algorithm: HashName, ...parts: string[]): string {
  const hash = createHash(algorithm.toLowerCase());
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest("hex");
}

/**
 * Parses `salt:identity:protocol:hashes:endian[:algorithm]:`
 */
export function parseChallenge(raw: string): Challenge {
  const fields = raw.trim().split(":");
  if (fields.length < 6 || fields[fields.length - 1] !== "") {
    throw new OperationalError("Server sent invalid challenge");
  }
  fields.pop();

  const [salt, identity, protocol, hashes, endian, algorithm] = fields;
  return {
    salt,
    identity,
    protocol,
    hashes: hashes.split(","),
    endian,
    algorithm: algorithm || undefined,
  };
}

function passwordForProtocol(challenge: Challenge, password: string): string {
  switch (challenge.protocol) {
    case "9": {
      const algorithm = challenge.algorithm;
      if (!algorithm || !isSupportedHash(algorithm)) {
        throw new NotSupportedError(`Unsupported password hash: ${algorithm ?? "none"}`);
      }
      return hexDigest(algorithm, password);
    }
    case "8":
      return password;
    default:
      throw new NotSupportedError(`We only speak protocol v8 and v9, server wants v${challenge.protocol}`);
  }
}

/**
 * Builds the login line `BIG:<user>:{ALGO}<hash>:<language>:<database>:`
 */
export function buildChallengeResponse(challenge: Challenge, credentials: Credentials): string {
  const password = passwordForProtocol(challenge, credentials.password);

  const algorithm = HASH_PREFERENCE.find((name) => challenge.hashes.includes(name));
  if (!algorithm) {
    throw new NotSupportedError(`Unsupported hash algorithms required for login: ${challenge.hashes.join(",")}`);
  }
  const pwhash = `{${algorithm}}${hexDigest(algorithm, password, challenge.salt)}`;

  return [
    config.endianness,
    credentials.username,
    pwhash,
    credentials.language,
    credentials.database,
  ].join(":") + ":";
}
