import { ApiProperty } from '@nestjs/swagger';
import { IsStrongPassword } from './password.rules';

export class ResetPasswordDto {
    @ApiProperty({ example: 'New*Password1', minLength: 8 })
    @IsStrongPassword()
    password!: string;
}
