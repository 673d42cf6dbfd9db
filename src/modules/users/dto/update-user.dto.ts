import { ApiPropertyOptional } from '@nestjs/swagger';
import {
    IsEmail,
    IsEnum,
    IsOptional,
    IsString,
    IsUrl,
    Matches,
    MaxLength,
    MinLength,
    ValidateIf,
} from 'class-validator';
import { NICKNAME_PATTERN } from '../../../common/utils/nickname.util';
import { UserRole } from '../enums/user-role.enum';
import {
    EMAIL_MESSAGE,
    NICKNAME_MIN_MESSAGE,
    NICKNAME_PATTERN_MESSAGE,
} from './create-user.dto';
import { IsStrongPassword } from './password.rules';

// Absent means unchanged; null is validated and rejected for NOT NULL columns
const isPresent = (_: object, value: unknown): boolean => value !== undefined;

export class UpdateUserDto {
    @ApiPropertyOptional({ example: 'jane.doe@example.com' })
    @ValidateIf(isPresent)
    @IsEmail({}, { message: EMAIL_MESSAGE })
    @MaxLength(255, { message: 'must be at most 255 characters long' })
    email?: string;

    @ApiPropertyOptional({ example: 'jane_doe' })
    @ValidateIf(isPresent)
    @IsString({ message: 'must be a string' })
    @MinLength(3, { message: NICKNAME_MIN_MESSAGE })
    @MaxLength(50, { message: 'must be at most 50 characters long' })
    @Matches(NICKNAME_PATTERN, { message: NICKNAME_PATTERN_MESSAGE })
    nickname?: string;

    @ApiPropertyOptional({ example: 'New*Password1', minLength: 8 })
    @ValidateIf(isPresent)
    @IsStrongPassword()
    password?: string;

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

    @ApiPropertyOptional()
    @IsOptional()
    @IsString({ message: 'must be a string' })
    @MaxLength(500, { message: 'must be at most 500 characters long' })
    bio?: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsUrl({ require_protocol: true }, { message: 'must be a valid URL' })
    profilePictureUrl?: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsUrl({ require_protocol: true }, { message: 'must be a valid URL' })
    linkedinProfileUrl?: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsUrl({ require_protocol: true }, { message: 'must be a valid URL' })
    githubProfileUrl?: string;

    @ApiPropertyOptional({ enum: UserRole })
    @IsOptional()
    @IsEnum(UserRole, { message: 'must be a valid role' })
    role?: UserRole;
}
