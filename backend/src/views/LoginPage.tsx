import React from 'react';
import Layout from './Layout';

type Props = {
    username?: string;
    error?: string;
};

const LoginPage: React.FC<Props> = ({ username = '', error }) => (
    <Layout title="Log in">
        {error ? <p className="alert-error">{error}</p> : null}
        <form method="post" action="/login">
            <label>
                Username
                <input name="username" defaultValue={username} autoComplete="username" required />
            </label>
            <label>
                Password
                <input name="password" type="password" autoComplete="current-password" required />
            </label>
            <p>
                <button type="submit">Log in</button>
            </p>
        </form>
        <p>
            No account yet? <a href="/register">Register</a>
        </p>
    </Layout>
);

export default LoginPage;
