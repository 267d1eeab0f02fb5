import { Inject, Injectable, Logger, UnauthorizedException } from "@nestjs/common";
import { CUSTOMER_DIRECTORY, type CustomerDirectory, type CustomerProfile } from "../customers/customer-directory";
import type { RequestOrigin } from "../refresh-tokens/replay-detector.service";
import { TokenRotationService, type IssuedSession } from "../refresh-tokens/token-rotation.service";
import { LoginDto } from "./dto/login.dto";
import { RegisterDto } from "./dto/register.dto";

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);

    constructor(
        @Inject(CUSTOMER_DIRECTORY) private readonly customers: CustomerDirectory,
        private readonly rotation: TokenRotationService,
    ) { }

    async register(dto: RegisterDto): Promise<CustomerProfile> {
        const customer = await this.customers.register(dto);
        this.logger.log(`Customer ${customer.id} registered`);
        return customer;
    }

    async login(dto: LoginDto, origin: RequestOrigin): Promise<IssuedSession> {
        const customer = await this.customers.verifyCredentials(dto.username, dto.password);
        if (!customer) {
            this.logger.warn(`Failed login for "${dto.username}" from IP ${origin.ip ?? "unknown"}`);
            throw new UnauthorizedException("Invalid credentials");
        }
        return this.rotation.startSession(customer, origin);
    }

    async profile(customerRef: string): Promise<CustomerProfile> {
        const customer = await this.customers.findProfile(customerRef);
        if (!customer) throw new UnauthorizedException("Account no longer exists");
        return customer;
    }
}
