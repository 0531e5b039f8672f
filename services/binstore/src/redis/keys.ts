// Key layout under a deployment prefix P:
//   P:bins:{name}:details          serialized bin, expires at created + ttl
//   P:bins:{name}:requests         list of request ids, expires one second later
//   P:bins:{name}:requests:{id}    serialized request, expires two seconds later
//   P:requests                     global request counter, never expires
// Names and ids never contain ':', which keeps the mapping injective.

export const EXPIRY_OFFSET = {
  details: 0,
  requestList: 1,
  request: 2,
} as const;

export const binDetailsKey = (prefix: string, name: string) => `${prefix}:bins:${name}:details`;

export const requestListKey = (prefix: string, name: string) => `${prefix}:bins:${name}:requests`;

export const requestKey = (prefix: string, name: string, requestId: string) =>
  `${prefix}:bins:${name}:requests:${requestId}`;

export const requestCountKey = (prefix: string) => `${prefix}:requests`;

/** Glob matching every bin details key, one per live bin. */
export const binDetailsPattern = (prefix: string) => `${prefix}:bins:*:details`;
