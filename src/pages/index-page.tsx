import { Layout, SITE_NAME } from './layout';

export interface IndexPageProps {
  plausibleDomain?: string;
}

export function IndexPage({ plausibleDomain }: IndexPageProps) {
  return (
    <Layout title={SITE_NAME} plausibleDomain={plausibleDomain}>
      <main>
        <div id="drop-zone" className="drop-zone">
          Drop a file here
        </div>
        <input id="file-input" type="file" name="file" className="file-input" />
      </main>
      <script src="/static/app.js" defer />
    </Layout>
  );
}
