export {
  type Session,
  type AuthProvider,
  type RefreshTokenAuthOptions,
  RefreshTokenAuthProvider,
  StaticTokenAuthProvider,
} from './auth-provider.js';
