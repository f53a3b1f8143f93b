import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { join } from 'node:path';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { requestLogMiddleware } from './common/middleware/request-log.middleware';
import type { AppConfig } from './config/env.validation';

export const STATIC_DIR = join(__dirname, '..', 'static');

/** HTTP plumbing shared by the server entry point and the e2e suite. Call before `listen`/`init`. */
export function configureApp(app: NestExpressApplication): void {
  // Hop count, never `true`: the throttler keys on req.ip.
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  app.set('trust proxy', config.get('TRUST_PROXY', { infer: true }));
  app.use(requestIdMiddleware);
  app.use(requestLogMiddleware);
  app.useStaticAssets(STATIC_DIR, { prefix: '/static/' });

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Hashdrop API')
      .setDescription(
        'Content-addressed file drop.\n\n' +
        'Files are stored under the SHA-256 of their bytes; the short link is a prefix of that hash.'
      )
      .setVersion('0.1.0')
      .setLicense('AGPL-3.0', 'https://www.gnu.org/licenses/agpl-3.0.html')
      .addTag('files', 'Upload and open files')
      .addTag('health', 'Health check endpoints')
      .build()
  );
  SwaggerModule.setup('docs', app, document);
}
