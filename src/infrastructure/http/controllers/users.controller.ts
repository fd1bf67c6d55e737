import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Param, Patch, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { LearnerProfileReadModel, RegisterUserOutputDto } from '@application/dtos';
import {
  GetLearnerProfileUseCase,
  ReassessProficiencyUseCase,
  RegisterUserUseCase,
  UpdateLearnerLanguagesUseCase,
} from '@application/use-cases';
import {
  ReassessProficiencyRequestDto,
  RegisterUserRequestDto,
  UpdateLanguagesRequestDto,
} from '../dtos/request';
import { unwrapOrThrow } from '../errors';

/**
 * Controller for learner registration and profile management.
 */
@ApiTags('Users')
@Controller('api/v1/users')
export class UsersController {
  constructor(
    @Inject('RegisterUserUseCase')
    private readonly registerUser: RegisterUserUseCase,
    @Inject('GetLearnerProfileUseCase')
    private readonly getLearnerProfile: GetLearnerProfileUseCase,
    @Inject('ReassessProficiencyUseCase')
    private readonly reassessProficiency: ReassessProficiencyUseCase,
    @Inject('UpdateLearnerLanguagesUseCase')
    private readonly updateLearnerLanguages: UpdateLearnerLanguagesUseCase,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Register a learner' })
  @ApiResponse({ status: 201, description: 'Learner registered' })
  @ApiBadRequestResponse({ description: 'Unknown language or identical native and target' })
  async register(@Body() dto: RegisterUserRequestDto): Promise<RegisterUserOutputDto> {
    return unwrapOrThrow(await this.registerUser.execute(dto));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a learner profile' })
  @ApiParam({ name: 'id', example: 'usr_4b1c0e9a-...' })
  @ApiNotFoundResponse({ description: 'User not found' })
  async getProfile(@Param('id') id: string): Promise<LearnerProfileReadModel> {
    return unwrapOrThrow(await this.getLearnerProfile.execute({ userId: id }));
  }

  @Patch(':id/proficiency')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Record a proficiency assessment',
    description: 'The level may stay the same or move one step up or down.',
  })
  @ApiConflictResponse({ description: 'Level jumps more than one step' })
  @ApiNotFoundResponse({ description: 'User not found' })
  async reassess(@Param('id') id: string, @Body() dto: ReassessProficiencyRequestDto): Promise<void> {
    unwrapOrThrow(await this.reassessProficiency.execute({ userId: id, level: dto.level }));
  }

  @Patch(':id/languages')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Change native and/or target language' })
  @ApiBadRequestResponse({ description: 'Unknown language or identical native and target' })
  @ApiNotFoundResponse({ description: 'User not found' })
  async updateLanguages(
    @Param('id') id: string,
    @Body() dto: UpdateLanguagesRequestDto,
  ): Promise<void> {
    unwrapOrThrow(await this.updateLearnerLanguages.execute({ userId: id, ...dto }));
  }
}
