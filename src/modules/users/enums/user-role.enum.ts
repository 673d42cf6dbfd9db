export enum UserRole {
    ANONYMOUS = 'ANONYMOUS',
    AUTHENTICATED = 'AUTHENTICATED',
    MANAGER = 'MANAGER',
    ADMIN = 'ADMIN',
}
