import type { ReactNode } from 'react';

const STYLES = `
  body { font-family: system-ui, sans-serif; max-width: 760px; margin: 0 auto; padding: 24px; color: #1e293b; }
  h1 { color: #1a237e; margin-bottom: 4px; }
  .caption { color: #64748b; margin-top: 0; }
  fieldset { border: 1px solid #e2e8f0; border-radius: 12px; padding: 16px; margin-bottom: 16px; }
  label { display: block; margin: 6px 0; }
  input[type=text], input[type=number], select { padding: 6px 8px; width: 100%; max-width: 420px; }
  button { padding: 8px 16px; border-radius: 8px; border: 1px solid #1a237e; background: #1a237e; color: white; cursor: pointer; }
  button.secondary { background: white; color: #1a237e; }
  .notice { padding: 12px; border-radius: 8px; background: #fef3c7; }
  .error { padding: 12px; border-radius: 8px; background: #fee2e2; }
  .success { padding: 12px; border-radius: 8px; background: #dcfce7; }
  .review { border-left: 4px solid #ef4444; padding-left: 12px; margin-bottom: 16px; }
  .actions { display: flex; gap: 12px; flex-wrap: wrap; margin-top: 16px; }
`;

export function Layout({
  title,
  children,
}: {
  title: string;
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <h1>Quiz Generator</h1>
        <p className="caption">Pick a topic, answer the questions, get instant results.</p>
        {children}
      </body>
    </html>
  );
}
