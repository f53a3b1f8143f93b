import {
  Controller,
  Get,
  Header,
  HttpCode,
  Param,
  Post,
  Req,
  Res,
  UploadedFile,
  UseFilters,
  UseGuards,
  UseInterceptors
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { memoryStorage } from 'multer';
import { extname } from 'node:path';
import { AnalyticsService } from '../analytics/analytics.service';
import { BasicAuthGuard } from '../auth/guards/basic-auth.guard';
import { getClientIp } from '../common/middleware/request-log.middleware';
import { RequestSignal } from '../common/request-signal.decorator';
import { renderFilePage, renderIndexPage } from '../pages/render';
import { FileErrorFilter } from './file-error.filter';
import { ObjectMissingError, StreamReadError } from './file-errors';
import { ObjectDirectory } from './object-directory.service';

export const MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

const TOKEN_CHARSET = /^[A-Za-z0-9_=-]+$/;

export interface UploadResponse {
  url: string;
}

export interface ParsedKey {
  token: string;
  /** Lower-cased extension without the dot, when the link asks for a direct download. */
  ext?: string;
}

/**
 * Splits `abcde.png` into token and extension. A dot only counts as an
 * extension separator once a full token precedes it.
 */
export function parseKey(key: string, tokenLength: number): ParsedKey | null {
  let token = key;
  let ext: string | undefined;

  const idx = key.indexOf('.');
  if (key.length > tokenLength && idx >= tokenLength) {
    token = key.slice(0, idx);
    ext = key.slice(idx + 1).toLowerCase();
  }

  if (token.length < tokenLength || !TOKEN_CHARSET.test(token)) {
    return null;
  }
  return { token, ext };
}

@ApiTags('files')
@Controller()
@UseFilters(FileErrorFilter)
export class FilesController {
  constructor(
    private readonly directory: ObjectDirectory,
    private readonly analytics: AnalyticsService
  ) {}

  @Get()
  @UseGuards(BasicAuthGuard)
  @Header('Content-Type', 'text/html; charset=utf-8')
  @ApiOperation({ summary: 'Upload page' })
  index(): string {
    return renderIndexPage(this.analytics.domain);
  }

  @Post()
  @HttpCode(200)
  @UseGuards(BasicAuthGuard)
  @UseInterceptors(
    FileInterceptor('file', {
      storage: memoryStorage(),
      limits: {
        fileSize: MAX_UPLOAD_BYTES
      }
    })
  )
  @ApiOperation({
    summary: 'Upload a file',
    description: 'Stores the file under its content hash and returns the short link path. Re-uploading identical content under the same name returns the same link.'
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: { type: 'string', format: 'binary' }
      },
      required: ['file']
    }
  })
  @ApiResponse({
    status: 200,
    description: 'File stored',
    schema: {
      type: 'object',
      properties: {
        url: { type: 'string', example: '/uU0nu' }
      }
    }
  })
  @ApiResponse({ status: 401, description: 'Basic auth required' })
  @ApiResponse({ status: 500, description: 'Upload could not be read or stored' })
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @RequestSignal() signal: AbortSignal
  ): Promise<UploadResponse> {
    if (!file) {
      throw new StreamReadError(new Error('Request has no "file" field'));
    }

    const url = await this.directory.upload(
      {
        // busboy hands over filenames decoded as latin1
        originalName: Buffer.from(file.originalname, 'latin1').toString('utf8'),
        contentType: file.mimetype,
        body: file.buffer
      },
      signal
    );
    return { url };
  }

  @Get(':key')
  @ApiOperation({
    summary: 'Open a stored file',
    description: 'Renders the file page for a token, or redirects straight to the file when the link ends in the file\'s extension.'
  })
  @ApiParam({ name: 'key', description: 'Token, optionally followed by the file extension', example: 'uU0nu.txt' })
  @ApiResponse({ status: 200, description: 'File page' })
  @ApiResponse({ status: 301, description: 'Redirect to the stored file' })
  @ApiResponse({ status: 404, description: 'No file for this token' })
  async lookup(
    @Param('key') key: string,
    @Req() req: Request,
    @Res() res: Response,
    @RequestSignal() signal: AbortSignal
  ): Promise<void> {
    const parsed = parseKey(key, this.directory.tokenLength);
    if (!parsed) {
      throw new ObjectMissingError(`Malformed token ${key}`);
    }

    const file = await this.directory.lookup(parsed.token, signal);

    if (parsed.ext === undefined) {
      res.type('html').send(renderFilePage(file, this.analytics.domain));
      return;
    }

    if (extname(file.originalName).toLowerCase() !== `.${parsed.ext}`) {
      throw new ObjectMissingError(`${parsed.token} is not a .${parsed.ext} file`);
    }

    void this.analytics.pageview({
      url: req.originalUrl || req.url,
      userAgent: req.get('user-agent'),
      clientIp: getClientIp(req)
    });
    res.redirect(301, file.url);
  }
}
