// src/state/keys.ts

const PREFIX = "filerelay:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

export const dedupKeys = {
  // One hash per content fingerprint, one field per cacheable destination.
  record: (fingerprint: string) => key(`dedup:${fingerprint}`),
};
