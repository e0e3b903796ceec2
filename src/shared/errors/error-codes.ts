export const ErrorCodes = {
  // Auth (1xxx)
  UNAUTHORIZED: 'AUTH_1001',
  INVALID_TOKEN: 'AUTH_1002',
  TOKEN_EXPIRED: 'AUTH_1003',
  FORBIDDEN: 'AUTH_1004',
  INVALID_CREDENTIALS: 'AUTH_1005',
  INVALID_ACCESS_CODE: 'AUTH_1006',

  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_2001',

  // Resource (3xxx)
  NOT_FOUND: 'RES_3001',
  CONFLICT: 'RES_3002',
  BAD_REQUEST: 'RES_3003',

  // Rate Limit (4xxx)
  RATE_LIMITED: 'RATE_4001',

  // Server (5xxx)
  INTERNAL_ERROR: 'SRV_5001',
  DATABASE_ERROR: 'SRV_5002',

  // Participants (6xxx)
  PARTICIPANT_NOT_FOUND: 'PAR_6001',
  PARTICIPANT_LINKED_TO_OTHER: 'PAR_6002',
  PARTICIPANT_NOT_OWNED: 'PAR_6003',
  NO_LINKED_PARTICIPANT: 'PAR_6004',

  // Registrations (7xxx)
  EVENT_FULL: 'REG_7001',
  ALREADY_REGISTERED: 'REG_7002',
  EVENT_NOT_FOUND: 'REG_7003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
