export interface LoginResponse {
    accessToken: string;
    tokenType: 'bearer';
}

export interface MessageResponse {
    message: string;
}
