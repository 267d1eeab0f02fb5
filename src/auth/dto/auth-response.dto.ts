import type { CustomerProfile } from "../../customers/customer-directory";
import type { IssuedSession } from "../../refresh-tokens/token-rotation.service";

export interface AuthResponse {
    message: string;
    user: CustomerProfile;
    accessToken: string;
    refreshToken: string;
    expiresIn: number;
}

export const toAuthResponse = (message: string, session: IssuedSession): AuthResponse => ({
    message,
    user: session.customer,
    accessToken: session.accessToken,
    refreshToken: session.refreshToken.value,
    expiresIn: session.expiresIn,
});
