import {
  Controller,
  Get,
  Logger,
  Param,
  ParseUUIDPipe,
  Req,
  Res,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { StatusStreamService } from './status-stream.service';

/**
 * StatusStreamController — SSE endpoint for a document's status transitions.
 *
 * Route: GET /documents/:id/events
 *
 * Each frame:
 *   id: 1
 *   event: status
 *   data: {"documentId":"...","status":"processing","publishedAt":"..."}
 *
 * The stream ends when the document reaches processed or failed, the
 * client disconnects, or the maximum lifetime (5 min) passes. An unknown
 * id gets a 404 JSON response and no stream.
 */
@Controller('documents')
export class StatusStreamController {
  private readonly logger = new Logger(StatusStreamController.name);

  constructor(private readonly statusStreamService: StatusStreamService) {}

  @Get(':id/events')
  async streamStatus(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Req() req: Request,
    @Res() res: Response,
  ): Promise<void> {
    this.logger.log(
      `SSE connection request for document ${id} from ${req.ip ?? 'unknown'}`,
    );
    await this.statusStreamService.streamStatus(id, res);
  }
}
