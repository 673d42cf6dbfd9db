import {
    Body,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Param,
    Post,
    UseGuards,
} from '@nestjs/common';
import {
    ApiBearerAuth,
    ApiOperation,
    ApiResponse,
    ApiTags,
} from '@nestjs/swagger';
import { ThrottlerGuard } from '@nestjs/throttler';
import { UserResponseDto } from '../users/dto/user-response.dto';
import { AuthService } from './auth.service';
import { CurrentUser } from './decorators/current-user.decorator';
import { Public } from './decorators/public.decorator';
import { LoginDto } from './dto/login.dto';
import { RegisterDto } from './dto/register.dto';
import {
    LoginResponse,
    MessageResponse,
} from './interfaces/auth-responses.interface';

@ApiTags('Authentication')
@Controller()
export class AuthController {
    constructor(private readonly authService: AuthService) {}

    @Public()
    @Post('register')
    @ApiOperation({ summary: 'Register a new account' })
    @ApiResponse({ status: 201, type: UserResponseDto })
    @ApiResponse({ status: 400, description: 'Email or nickname already taken' })
    @ApiResponse({ status: 422, description: 'Validation error' })
    async register(@Body() registerDto: RegisterDto): Promise<UserResponseDto> {
        const user = await this.authService.register(registerDto);
        return UserResponseDto.fromEntity(user);
    }

    @Public()
    @UseGuards(ThrottlerGuard)
    @Post('login')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Exchange credentials for an access token' })
    @ApiResponse({ status: 200, description: 'Login successful' })
    @ApiResponse({ status: 400, description: 'Account locked' })
    @ApiResponse({ status: 401, description: 'Incorrect email or password' })
    async login(@Body() loginDto: LoginDto): Promise<LoginResponse> {
        return this.authService.login(loginDto);
    }

    @Public()
    @Get('verify-email/:userId/:token')
    @ApiOperation({ summary: 'Verify an email address' })
    @ApiResponse({ status: 200, description: 'Email verified successfully' })
    @ApiResponse({ status: 400, description: 'Invalid or expired token' })
    async verifyEmail(
        @Param('userId') userId: string,
        @Param('token') token: string,
    ): Promise<MessageResponse> {
        return this.authService.verifyEmail(userId, token);
    }

    @Get('me')
    @ApiBearerAuth('access-token')
    @ApiOperation({ summary: 'Profile of the authenticated user' })
    @ApiResponse({ status: 200, type: UserResponseDto })
    async me(@CurrentUser('id') userId: string): Promise<UserResponseDto> {
        const user = await this.authService.getProfile(userId);
        return UserResponseDto.fromEntity(user);
    }
}
