import { Layout } from './Layout';

export function ErrorPage({
  statusCode,
  message,
}: {
  statusCode: number;
  message: string;
}) {
  return (
    <Layout title="Something went wrong">
      <p className="error">
        Failed to complete the request ({statusCode}). {message}
      </p>
      <p>
        <a href="/">Back to the quiz form</a>
      </p>
    </Layout>
  );
}
