export interface KeyspaceStats {
  keys: number;
  expires: number;
}

export interface RedisInfo {
  usedMemory: number;
  keyspace: Record<string, KeyspaceStats>;
}

/**
 * Pulls the fields we need out of an `INFO` reply:
 *   used_memory:1048576
 *   db0:keys=12,expires=12,avg_ttl=0
 */
export function parseInfo(raw: string): RedisInfo {
  const info: RedisInfo = { usedMemory: 0, keyspace: {} };

  for (const line of raw.split(/\r?\n/)) {
    if (!line || line.startsWith('#')) continue;
    const sep = line.indexOf(':');
    if (sep < 0) continue;
    const field = line.slice(0, sep);
    const value = line.slice(sep + 1);

    if (field === 'used_memory') {
      info.usedMemory = toNumber(value);
    } else if (/^db\d+$/.test(field)) {
      const attrs = Object.fromEntries(
        value.split(',').map((pair) => {
          const [k = '', v = ''] = pair.split('=');
          return [k, v] as const;
        }),
      );
      info.keyspace[field] = { keys: toNumber(attrs.keys), expires: toNumber(attrs.expires) };
    }
  }

  return info;
}

function toNumber(value: string | undefined): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}
