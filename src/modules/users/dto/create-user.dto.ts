import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
    IsEmail,
    IsEnum,
    IsOptional,
    IsString,
    IsUrl,
    Matches,
    MaxLength,
    MinLength,
} from 'class-validator';
import { NICKNAME_PATTERN } from '../../../common/utils/nickname.util';
import { UserRole } from '../enums/user-role.enum';
import { IsStrongPassword } from './password.rules';

export const EMAIL_MESSAGE = 'value is not a valid email address';
export const NICKNAME_MIN_MESSAGE = 'must be at least 3 characters long';
export const NICKNAME_PATTERN_MESSAGE =
    'may only contain letters, digits, underscores and hyphens';
const URL_MESSAGE = 'must be a valid URL';

export class CreateUserDto {
    @ApiProperty({
        description: 'Email address, unique across users',
        example: 'jane.doe@example.com',
    })
    @IsEmail({}, { message: EMAIL_MESSAGE })
    @MaxLength(255, { message: 'must be at most 255 characters long' })
    email!: string;

    @ApiProperty({
        description: 'Plain password, hashed before storage',
        example: 'Secure*Password1',
        minLength: 8,
        maxLength: 100,
    })
    @IsStrongPassword()
    password!: string;

    @ApiPropertyOptional({
        description: 'Public handle; generated when omitted',
        example: 'jane_doe',
    })
    @IsOptional()
    @IsString({ message: 'must be a string' })
    @MinLength(3, { message: NICKNAME_MIN_MESSAGE })
    @MaxLength(50, { message: 'must be at most 50 characters long' })
    @Matches(NICKNAME_PATTERN, { message: NICKNAME_PATTERN_MESSAGE })
    nickname?: string;

    @ApiPropertyOptional({ example: 'Jane' })
    @IsOptional()
    @IsString({ message: 'must be a string' })
    @MaxLength(100, { message: 'must be at most 100 characters long' })
    firstName?: string;

    @ApiPropertyOptional({ example: 'Doe' })
    @IsOptional()
    @IsString({ message: 'must be a string' })
    @MaxLength(100, { message: 'must be at most 100 characters long' })
    lastName?: string;

    @ApiPropertyOptional({ example: 'Backend developer.' })
    @IsOptional()
    @IsString({ message: 'must be a string' })
    @MaxLength(500, { message: 'must be at most 500 characters long' })
    bio?: string;

    @ApiPropertyOptional({ example: 'https://example.com/jane.png' })
    @IsOptional()
    @IsUrl({ require_protocol: true }, { message: URL_MESSAGE })
    profilePictureUrl?: string;

    @ApiPropertyOptional({ example: 'https://linkedin.com/in/janedoe' })
    @IsOptional()
    @IsUrl({ require_protocol: true }, { message: URL_MESSAGE })
    linkedinProfileUrl?: string;

    @ApiPropertyOptional({ example: 'https://github.com/janedoe' })
    @IsOptional()
    @IsUrl({ require_protocol: true }, { message: URL_MESSAGE })
    githubProfileUrl?: string;

    @ApiPropertyOptional({
        description: 'Only honoured when an administrator creates the account',
        enum: UserRole,
    })
    @IsOptional()
    @IsEnum(UserRole, { message: 'must be a valid role' })
    role?: UserRole;
}
