import type { ResolvedFile } from '../files/object-directory.service';
import { Layout } from './layout';

export interface FilePageProps {
  file: ResolvedFile;
  plausibleDomain?: string;
}

export function FilePage({ file, plausibleDomain }: FilePageProps) {
  return (
    <Layout title={file.originalName} plausibleDomain={plausibleDomain}>
      <main className="file">
        {file.isImage ? (
          <a href={file.url}>
            <img src={file.url} alt={file.originalName} />
          </a>
        ) : (
          <a className="download" href={file.url} download={file.originalName}>
            {file.originalName}
          </a>
        )}
      </main>
    </Layout>
  );
}
