import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Logger, Post, Req, Res, UseGuards } from "@nestjs/common";
import type { Request, Response } from "express";
import type { AccessTokenClaims } from "../access-tokens/access-token.issuer";
import { APP_CONFIG, type AppConfig } from "../config/env";
import { Serialize } from "../interceptors/serialize.interceptor";
import { RefreshRateLimitGuard } from "../rate-limit/refresh-rate-limit.guard";
import { MissingRefreshTokenError, RefreshTokenError } from "../refresh-tokens/refresh-token.errors";
import { TokenRotationService } from "../refresh-tokens/token-rotation.service";
import { clearRefreshCookie, setRefreshCookie } from "./auth-cookies";
import { AuthService } from "./auth.service";
import { readRefreshCookie, requestOrigin } from "./client-origin";
import { CurrentUser } from "./current-user.decorator";
import { toAuthResponse } from "./dto/auth-response.dto";
import { LoginDto } from "./dto/login.dto";
import { RegisterDto } from "./dto/register.dto";
import { SessionDto } from "./dto/session.dto";
import { JwtAccessGuard } from "./guards/jwt-access.guard";
import { toHttpException } from "./http-errors";

@Controller("auth")
export class AuthController {
    private readonly logger = new Logger(AuthController.name);

    constructor(
        private readonly authService: AuthService,
        private readonly rotation: TokenRotationService,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
    ) { }

    @Post("register")
    @HttpCode(HttpStatus.CREATED)
    async register(@Body() dto: RegisterDto) {
        await this.authService.register(dto);
        return { message: "Registration successful" };
    }

    @Post("login")
    @HttpCode(HttpStatus.OK)
    async login(@Body() dto: LoginDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
        const session = await this.authService.login(dto, requestOrigin(req));
        setRefreshCookie(res, session.refreshToken.value, this.config);
        return toAuthResponse("Login successful", session);
    }

    @UseGuards(RefreshRateLimitGuard)
    @Post("refresh")
    @HttpCode(HttpStatus.OK)
    async refresh(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
        try {
            const value = readRefreshCookie(req);
            if (!value) throw new MissingRefreshTokenError();

            const session = await this.rotation.refreshAccessToken(value, requestOrigin(req));
            setRefreshCookie(res, session.refreshToken.value, this.config);
            return toAuthResponse("Token refreshed successfully", session);
        } catch (error) {
            // never leave a poisoned credential behind for the client to retry with
            clearRefreshCookie(res, this.config);
            if (error instanceof RefreshTokenError || error instanceof MissingRefreshTokenError) {
                this.logger.warn(`Refresh failed: ${error.name}`);
            } else {
                this.logger.error(`Token refresh failed: ${error instanceof Error ? error.message : String(error)}`,
                    error instanceof Error ? error.stack : undefined);
            }
            throw toHttpException(error);
        }
    }

    @Post("logout")
    @HttpCode(HttpStatus.OK)
    async logout(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
        try {
            const value = readRefreshCookie(req);
            if (value) {
                await this.rotation.revoke(value);
            } else {
                this.logger.warn("No refresh token found in cookie during logout");
            }
        } catch (error) {
            this.logger.error(`Error during logout: ${error instanceof Error ? error.message : String(error)}`);
        } finally {
            clearRefreshCookie(res, this.config);
        }
        return { message: "Logout successful" };
    }

    @UseGuards(JwtAccessGuard)
    @Get("me")
    async me(@CurrentUser() user: AccessTokenClaims) {
        const customer = await this.authService.profile(user.sub);
        return { user: { id: customer.id, name: customer.name, email: customer.email, roles: customer.roles } };
    }

    @UseGuards(JwtAccessGuard)
    @Get("sessions")
    @Serialize(SessionDto)
    sessions(@CurrentUser() user: AccessTokenClaims) {
        return this.rotation.activeSessions(user.sub);
    }
}
