export type UserRole = "ADMIN" | "USER";

export interface AuthContext {
  userId: number;
  role: UserRole;
  isAuthenticated: boolean;
}
