import { OmitType } from '@nestjs/swagger';
import { CreateUserDto } from '../../users/dto/create-user.dto';

/**
 * Self-registration body. The role is assigned by the service.
 */
export class RegisterDto extends OmitType(CreateUserDto, ['role'] as const) {}
