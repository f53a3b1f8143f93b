import { Layout } from './layout';

export function NotFoundPage({ plausibleDomain }: { plausibleDomain?: string }) {
  return (
    <Layout title="No file found!" plausibleDomain={plausibleDomain}>
      <main className="not-found">
        <h1>No file found!</h1>
        <p>
          Nothing is stored under that link. <a href="/">Upload something</a>?
        </p>
      </main>
    </Layout>
  );
}
