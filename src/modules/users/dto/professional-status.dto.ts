import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean } from 'class-validator';

export class ProfessionalStatusDto {
    @ApiProperty({ example: true })
    @IsBoolean({ message: 'must be a boolean' })
    isProfessional!: boolean;
}
