import React from 'react';
import Layout from './Layout';

type Props = {
    title?: string;
    message: string;
    username?: string;
};

const ErrorPage: React.FC<Props> = ({ title = 'Something went wrong', message, username }) => (
    <Layout title={title} username={username}>
        <p className="alert-error">{message}</p>
        <p>
            <a href="/">Back to start</a>
        </p>
    </Layout>
);

export default ErrorPage;
