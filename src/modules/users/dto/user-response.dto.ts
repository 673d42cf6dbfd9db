import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { User } from '../entities/user.entity';
import { UserRole } from '../enums/user-role.enum';

/**
 * Public view of a user. Credentials and the verification token stay out.
 */
export class UserResponseDto {
    @ApiProperty() id!: string;
    @ApiProperty() nickname!: string;
    @ApiProperty() email!: string;
    @ApiPropertyOptional({ nullable: true }) firstName!: string | null;
    @ApiPropertyOptional({ nullable: true }) lastName!: string | null;
    @ApiPropertyOptional({ nullable: true }) bio!: string | null;
    @ApiPropertyOptional({ nullable: true }) profilePictureUrl!: string | null;
    @ApiPropertyOptional({ nullable: true }) linkedinProfileUrl!: string | null;
    @ApiPropertyOptional({ nullable: true }) githubProfileUrl!: string | null;
    @ApiProperty({ enum: UserRole }) role!: UserRole;
    @ApiProperty() isProfessional!: boolean;
    @ApiProperty() emailVerified!: boolean;
    @ApiProperty() isLocked!: boolean;
    @ApiPropertyOptional({ nullable: true }) lastLoginAt!: Date | null;
    @ApiProperty() createdAt!: Date;
    @ApiProperty() updatedAt!: Date;

    static fromEntity(user: User): UserResponseDto {
        const {
            hashedPassword: _password,
            verificationToken: _token,
            failedLoginAttempts: _attempts,
            professionalStatusUpdatedAt: _stamp,
            ...visible
        } = user;
        return Object.assign(new UserResponseDto(), visible);
    }
}

export class UserListResponseDto {
    @ApiProperty({ type: [UserResponseDto] }) items!: UserResponseDto[];
    @ApiProperty() total!: number;
    @ApiProperty() skip!: number;
    @ApiProperty() limit!: number;
}
