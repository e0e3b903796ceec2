// Services
export { registerAccount, authenticate, getUserById } from './users.service.js';

// Types & Permissions
export {
  UserRole,
  type UserRoleType,
  Capability,
  type CapabilityType,
  can,
} from './permissions.js';

export {
  RegisterAccountSchema,
  LoginSchema,
  UserResponseSchema,
  AuthResponseSchema,
  RegisterAccountResponseSchema,
  MeResponseSchema,
  type RegisterAccountInput,
  type LoginInput,
  type UserResponse,
} from './users.schema.js';

// Routes
export { authRoutes } from './users.routes.js';
