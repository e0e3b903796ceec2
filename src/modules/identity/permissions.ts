export const UserRole = {
  ADMIN: 'admin',
  CAREGIVER: 'caregiver',
} as const;

export type UserRoleType = (typeof UserRole)[keyof typeof UserRole];

export const Capability = {
  CREATE_EVENTS: 'events:create',
  READ_REGISTRATIONS: 'registrations:read',
  EXPORT_REGISTRATIONS: 'registrations:export',
  REGISTER_WALKIN: 'registrations:walkin',
  MANAGE_PARTICIPANTS: 'participants:manage',
} as const;

export type CapabilityType = (typeof Capability)[keyof typeof Capability];

const ROLE_CAPABILITIES: Record<UserRoleType, readonly CapabilityType[]> = {
  [UserRole.ADMIN]: Object.values(Capability),
  [UserRole.CAREGIVER]: [Capability.MANAGE_PARTICIPANTS],
};

export function can(role: UserRoleType, capability: CapabilityType): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}
