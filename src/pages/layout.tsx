import type { ReactNode } from 'react';

export const SITE_NAME = 'Hashdrop';

export interface LayoutProps {
  title: string;
  plausibleDomain?: string;
  children: ReactNode;
}

export function Layout({ title, plausibleDomain, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <link rel="stylesheet" href="/static/style.css" />
        {plausibleDomain ? (
          <script defer data-domain={plausibleDomain} src="https://plausible.io/js/script.js" />
        ) : null}
      </head>
      <body>{children}</body>
    </html>
  );
}
