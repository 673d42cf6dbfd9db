import {
    Column,
    CreateDateColumn,
    Entity,
    PrimaryGeneratedColumn,
    UpdateDateColumn,
} from 'typeorm';
import { UserRole } from '../enums/user-role.enum';

@Entity({ name: 'users' })
export class User {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 50, unique: true })
    nickname!: string;

    @Column({ type: 'varchar', length: 255, unique: true })
    email!: string;

    @Column({ name: 'first_name', type: 'varchar', length: 100, nullable: true })
    firstName!: string | null;

    @Column({ name: 'last_name', type: 'varchar', length: 100, nullable: true })
    lastName!: string | null;

    @Column({ type: 'text', nullable: true })
    bio!: string | null;

    @Column({
        name: 'profile_picture_url',
        type: 'varchar',
        length: 255,
        nullable: true,
    })
    profilePictureUrl!: string | null;

    @Column({
        name: 'linkedin_profile_url',
        type: 'varchar',
        length: 255,
        nullable: true,
    })
    linkedinProfileUrl!: string | null;

    @Column({
        name: 'github_profile_url',
        type: 'varchar',
        length: 255,
        nullable: true,
    })
    githubProfileUrl!: string | null;

    @Column({ type: 'enum', enum: UserRole, default: UserRole.ANONYMOUS })
    role!: UserRole;

    @Column({ name: 'is_professional', type: 'boolean', default: false })
    isProfessional!: boolean;

    @Column({
        name: 'professional_status_updated_at',
        type: 'timestamptz',
        nullable: true,
    })
    professionalStatusUpdatedAt!: Date | null;

    @Column({ name: 'last_login_at', type: 'timestamptz', nullable: true })
    lastLoginAt!: Date | null;

    @Column({ name: 'failed_login_attempts', type: 'integer', default: 0 })
    failedLoginAttempts!: number;

    @Column({ name: 'is_locked', type: 'boolean', default: false })
    isLocked!: boolean;

    @Column({ name: 'hashed_password', type: 'varchar', length: 255 })
    hashedPassword!: string;

    @Column({
        name: 'verification_token',
        type: 'varchar',
        length: 255,
        nullable: true,
    })
    verificationToken!: string | null;

    @Column({ name: 'email_verified', type: 'boolean', default: false })
    emailVerified!: boolean;

    @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
    updatedAt!: Date;
}
