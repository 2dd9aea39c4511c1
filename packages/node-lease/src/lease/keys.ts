export const REGISTRY_SET = "Token";
export const UNASSIGNED_SET = "Unassigned";
export const ASSIGNED_SET = "Assigned";

const TOKEN_PREFIX = "token:";
const LEASE_SUFFIX = ":tokens";
const ASSIGNMENT_SUFFIX = ":assigned";
const AVAILABILITY_SUFFIX = ":unassigned";

export type TokenKeys = {
  member: string;
  leaseTimer: string;
  assignmentTimer: string;
  availabilityTimer: string;
};

export function tokenKeys(tokenId: string): TokenKeys {
  const member = `${TOKEN_PREFIX}${tokenId}`;
  return {
    member,
    leaseTimer: `${member}${LEASE_SUFFIX}`,
    assignmentTimer: `${member}${ASSIGNMENT_SUFFIX}`,
    availabilityTimer: `${member}${AVAILABILITY_SUFFIX}`,
  };
}

export function tokenIdFromMember(member: string): string | null {
  if (!member.startsWith(TOKEN_PREFIX)) return null;
  const tokenId = member.slice(TOKEN_PREFIX.length);
  return tokenId.length > 0 && !tokenId.includes(":") ? tokenId : null;
}

export type ExpiredTimer =
  | { timer: "lease"; tokenId: string }
  | { timer: "assignment"; tokenId: string }
  | { timer: "availability"; tokenId: string };

export function parseExpiredKey(key: string): ExpiredTimer | null {
  const suffixes = [
    [LEASE_SUFFIX, "lease"],
    [ASSIGNMENT_SUFFIX, "assignment"],
    [AVAILABILITY_SUFFIX, "availability"],
  ] as const;

  // Each suffix starts with ":" so no suffix is a tail of another; the first
  // match is the only candidate.
  for (const [suffix, timer] of suffixes) {
    if (!key.endsWith(suffix)) continue;
    const tokenId = tokenIdFromMember(key.slice(0, -suffix.length));
    return tokenId ? { timer, tokenId } : null;
  }

  return null;
}
