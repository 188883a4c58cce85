import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query, UseGuards } from '@nestjs/common';
import type { UpdateNegotiationResult } from '@tidewater/shared';
import { AdminTokenGuard } from '../common/admin-token.guard';
import { RateLimitGuard, RateLimit } from '../common/rate-limit.guard';
import { parseFlag } from '../common/config.util';
import { MemoryNotesOutput } from '../common/notes-output';
import { UpdateNegotiator } from './update-negotiator.service';
import { UpdateCoordinator } from './update-coordinator.service';
import { DownloadDto, NegotiateDto, RollbackDto } from './dto/updates.dto';

interface NotesResponse {
  notes: string[];
}

@Controller('updates')
@UseGuards(AdminTokenGuard, RateLimitGuard)
export class UpdatesController {
  constructor(
    private readonly negotiator: UpdateNegotiator,
    private readonly coordinator: UpdateCoordinator,
  ) {}

  /**
   * GET /updates/count?force=1
   */
  @Get('count')
  @RateLimit({ limit: 30, windowMs: 60000 })
  async count(@Query('force') force?: string): Promise<{ count: number }> {
    return { count: await this.negotiator.check(parseFlag(force, false)) };
  }

  @Post('negotiate')
  @HttpCode(HttpStatus.OK)
  @RateLimit({ limit: 10, windowMs: 60000 })
  async negotiate(@Body() dto: NegotiateDto): Promise<UpdateNegotiationResult> {
    return this.negotiator.negotiate(dto.force ?? false);
  }

  @Post('apply')
  @HttpCode(HttpStatus.OK)
  @RateLimit({ limit: 5, windowMs: 60000 })
  async apply(): Promise<NotesResponse> {
    return this.withNotes(() => this.coordinator.runFullUpdate());
  }

  @Post('download')
  @HttpCode(HttpStatus.OK)
  @RateLimit({ limit: 10, windowMs: 60000 })
  async download(@Body() dto: DownloadDto): Promise<NotesResponse> {
    return this.withNotes(() =>
      this.coordinator.downloadAndExtract(dto.kind, dto.code ?? '', dto.hash, {
        installation: dto.installation,
      }),
    );
  }

  @Post('plugins/:code/rollback')
  @HttpCode(HttpStatus.OK)
  @RateLimit({ limit: 5, windowMs: 60000 })
  async rollback(@Param('code') code: string, @Body() dto: RollbackDto): Promise<NotesResponse> {
    return this.withNotes(() => this.coordinator.rollbackPlugin(code, dto.version));
  }

  private async withNotes(run: () => Promise<void>): Promise<NotesResponse> {
    const output = new MemoryNotesOutput();
    this.coordinator.setNotesOutput(output);
    try {
      await run();
    } finally {
      this.coordinator.setNotesOutput(null);
    }
    return { notes: output.lines };
  }
}
