import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { KeygenService } from './keygen.service';
import { CreateKeygenRequestDto } from './dto/create-keygen-request.dto';
import { KeygenResultDto, KeygenSubmissionDto } from './dto/keygen-result.dto';

/**
 * Keygen Controller
 *
 * - POST /keygen              - Submit a key generation job
 * - GET  /result/:requestId   - Poll a job's status and, once complete, its keys
 */
@Controller()
export class KeygenController {
  constructor(private readonly keygenService: KeygenService) {}

  @Post('keygen')
  @HttpCode(HttpStatus.ACCEPTED)
  async submit(@Body() dto: CreateKeygenRequestDto): Promise<KeygenSubmissionDto> {
    return this.keygenService.submit(dto);
  }

  @Get('result/:requestId')
  async getResult(@Param('requestId') requestId: string): Promise<KeygenResultDto> {
    return this.keygenService.getResult(requestId);
  }
}
