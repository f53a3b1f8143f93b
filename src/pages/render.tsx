import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { ResolvedFile } from '../files/object-directory.service';
import { FilePage } from './file-page';
import { IndexPage } from './index-page';
import { NotFoundPage } from './not-found-page';

export function renderPage(page: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(page)}`;
}

export const renderIndexPage = (plausibleDomain?: string) =>
  renderPage(<IndexPage plausibleDomain={plausibleDomain} />);

export const renderFilePage = (file: ResolvedFile, plausibleDomain?: string) =>
  renderPage(<FilePage file={file} plausibleDomain={plausibleDomain} />);

export const renderNotFoundPage = (plausibleDomain?: string) =>
  renderPage(<NotFoundPage plausibleDomain={plausibleDomain} />);
