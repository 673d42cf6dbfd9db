import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsNotEmpty, IsString } from 'class-validator';
import { EMAIL_MESSAGE } from '../../users/dto/create-user.dto';

export class LoginDto {
    @ApiProperty({ example: 'jane.doe@example.com' })
    @IsEmail({}, { message: EMAIL_MESSAGE })
    email!: string;

    @ApiProperty({ example: 'Secure*Password1' })
    @IsString({ message: 'must be a string' })
    @IsNotEmpty({ message: 'is required' })
    password!: string;
}
