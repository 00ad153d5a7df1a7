import type { AuthContext } from "./context";
import type { UserProfile } from "../blog/repository";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
      currentUser?: UserProfile;
    }
  }
}

export {};
