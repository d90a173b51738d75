import React from 'react';

type Props = {
    title: string;
    username?: string;
    children: React.ReactNode;
};

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 0; color: #1b2b22; background: #f5f8f4; }
header { background: #2f6b45; color: #fff; padding: 0.75rem 1.5rem; display: flex; gap: 1.5rem; align-items: center; }
header a, header button { color: #fff; background: none; border: none; font: inherit; cursor: pointer; text-decoration: none; }
header nav { display: flex; gap: 1rem; flex: 1; }
main { max-width: 52rem; margin: 1.5rem auto; padding: 0 1.5rem; }
table { border-collapse: collapse; width: 100%; }
th, td { text-align: left; padding: 0.4rem 0.6rem; border-bottom: 1px solid #d5e0d6; }
td.number, th.number { text-align: right; }
label { display: block; margin-top: 0.75rem; }
.field-error, .alert-error { color: #a32121; }
.alert-success { color: #2f6b45; }
`;

/**
 * Shared page chrome: navigation for signed-in users, plain header otherwise.
 */
const Layout: React.FC<Props> = ({ title, username, children }) => (
    <html lang="en">
        <head>
            <meta charSet="utf-8" />
            <meta name="viewport" content="width=device-width, initial-scale=1" />
            <title>{`${title} · Carbon Log`}</title>
            <style dangerouslySetInnerHTML={{ __html: STYLES }} />
        </head>
        <body>
            <header>
                <strong>Carbon Log</strong>
                {username ? (
                    <>
                        <nav>
                            <a href="/records/new">Log activity</a>
                            <a href="/records">History</a>
                            <a href="/summary">Summary</a>
                        </nav>
                        <form method="post" action="/logout">
                            <span>{username} </span>
                            <button type="submit">Log out</button>
                        </form>
                    </>
                ) : (
                    <nav>
                        <a href="/login">Log in</a>
                        <a href="/register">Register</a>
                    </nav>
                )}
            </header>
            <main>
                <h1>{title}</h1>
                {children}
            </main>
        </body>
    </html>
);

export default Layout;
