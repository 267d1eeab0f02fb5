export const CUSTOMER_DIRECTORY = Symbol("CUSTOMER_DIRECTORY");

export const DEFAULT_CUSTOMER_ROLE = "ROLE_USER";

export interface CustomerProfile {
    id: string;
    name: string;
    email: string;
    roles: string[];
}

export interface NewCustomer {
    name: string;
    email: string;
    password: string;
}

/** What the auth flow needs to know about customers, independent of storage. */
export interface CustomerDirectory {
    findProfile(customerRef: string): Promise<CustomerProfile | null>;
    /** Resolves the customer when the email/password pair is valid, otherwise null. */
    verifyCredentials(email: string, password: string): Promise<CustomerProfile | null>;
    /** Throws ConflictException when the email is taken. */
    register(input: NewCustomer): Promise<CustomerProfile>;
}
