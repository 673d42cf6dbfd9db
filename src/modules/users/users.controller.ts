import {
    Body,
    Controller,
    Delete,
    Get,
    HttpCode,
    HttpStatus,
    NotFoundException,
    Param,
    Patch,
    Post,
    Put,
    Query,
} from '@nestjs/common';
import {
    ApiBearerAuth,
    ApiOperation,
    ApiResponse,
    ApiTags,
} from '@nestjs/swagger';
import { Roles } from '../auth/decorators/roles.decorator';
import { CreateUserDto } from './dto/create-user.dto';
import { ListUsersQueryDto } from './dto/list-users-query.dto';
import { ProfessionalStatusDto } from './dto/professional-status.dto';
import { ResetPasswordDto } from './dto/reset-password.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import {
    UserListResponseDto,
    UserResponseDto,
} from './dto/user-response.dto';
import { UserRole } from './enums/user-role.enum';
import { UsersService } from './users.service';

const USER_NOT_FOUND = 'User not found';

@ApiTags('Users')
@ApiBearerAuth('access-token')
@Roles(UserRole.ADMIN, UserRole.MANAGER)
@Controller('users')
export class UsersController {
    constructor(private readonly usersService: UsersService) {}

    @Post()
    @ApiOperation({ summary: 'Create a user' })
    @ApiResponse({ status: 201, type: UserResponseDto })
    @ApiResponse({ status: 400, description: 'Email or nickname already taken' })
    async create(@Body() createUserDto: CreateUserDto): Promise<UserResponseDto> {
        const user = await this.usersService.create(createUserDto, { isAdmin: true });
        return UserResponseDto.fromEntity(user);
    }

    @Get()
    @ApiOperation({ summary: 'List users, oldest first' })
    @ApiResponse({ status: 200, type: UserListResponseDto })
    async list(@Query() query: ListUsersQueryDto): Promise<UserListResponseDto> {
        const [users, total] = await Promise.all([
            this.usersService.listUsers(query.skip, query.limit),
            this.usersService.count(),
        ]);

        return {
            items: users.map((user) => UserResponseDto.fromEntity(user)),
            total,
            skip: query.skip,
            limit: query.limit,
        };
    }

    @Get(':id')
    @ApiOperation({ summary: 'Get a user by id' })
    @ApiResponse({ status: 200, type: UserResponseDto })
    @ApiResponse({ status: 404, description: USER_NOT_FOUND })
    async findOne(@Param('id') id: string): Promise<UserResponseDto> {
        const user = await this.usersService.getById(id);
        if (!user) {
            throw new NotFoundException(USER_NOT_FOUND);
        }
        return UserResponseDto.fromEntity(user);
    }

    @Put(':id')
    @ApiOperation({ summary: 'Update a user' })
    @ApiResponse({ status: 200, type: UserResponseDto })
    @ApiResponse({ status: 404, description: USER_NOT_FOUND })
    @ApiResponse({ status: 422, description: 'Validation error or conflict' })
    async update(
        @Param('id') id: string,
        @Body() updateUserDto: UpdateUserDto,
    ): Promise<UserResponseDto> {
        const user = await this.usersService.update(id, updateUserDto);
        if (!user) {
            throw new NotFoundException(USER_NOT_FOUND);
        }
        return UserResponseDto.fromEntity(user);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete a user' })
    @ApiResponse({ status: 204, description: 'User deleted' })
    @ApiResponse({ status: 404, description: USER_NOT_FOUND })
    async remove(@Param('id') id: string): Promise<void> {
        if (!(await this.usersService.delete(id))) {
            throw new NotFoundException(USER_NOT_FOUND);
        }
    }

    @Post(':id/unlock')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Unlock a locked account' })
    @ApiResponse({ status: 404, description: 'User not found or not locked' })
    async unlock(@Param('id') id: string): Promise<{ unlocked: true }> {
        if (!(await this.usersService.unlockUserAccount(id))) {
            throw new NotFoundException('User not found or not locked');
        }
        return { unlocked: true };
    }

    @Post(':id/reset-password')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Set a new password and reopen the account' })
    @ApiResponse({ status: 204, description: 'Password reset' })
    @ApiResponse({ status: 404, description: USER_NOT_FOUND })
    async resetPassword(
        @Param('id') id: string,
        @Body() resetPasswordDto: ResetPasswordDto,
    ): Promise<void> {
        if (!(await this.usersService.resetPassword(id, resetPasswordDto.password))) {
            throw new NotFoundException(USER_NOT_FOUND);
        }
    }

    @Patch(':id/professional-status')
    @ApiOperation({ summary: 'Set the professional flag' })
    @ApiResponse({ status: 200, type: UserResponseDto })
    @ApiResponse({ status: 404, description: USER_NOT_FOUND })
    async updateProfessionalStatus(
        @Param('id') id: string,
        @Body() dto: ProfessionalStatusDto,
    ): Promise<UserResponseDto> {
        const user = await this.usersService.updateProfessionalStatus(
            id,
            dto.isProfessional,
        );
        if (!user) {
            throw new NotFoundException(USER_NOT_FOUND);
        }
        return UserResponseDto.fromEntity(user);
    }
}
