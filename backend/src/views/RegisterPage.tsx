import React from 'react';
import type { FieldErrors } from '../utils/errors';
import FieldError from './FieldError';
import Layout from './Layout';

type Props = {
    values?: { username: string; email: string };
    errors?: FieldErrors;
};

const RegisterPage: React.FC<Props> = ({ values = { username: '', email: '' }, errors = {} }) => (
    <Layout title="Register">
        <form method="post" action="/register">
            <label>
                Username
                <input name="username" defaultValue={values.username} autoComplete="username" required />
            </label>
            <FieldError message={errors.username} />
            <label>
                Email
                <input name="email" type="email" defaultValue={values.email} autoComplete="email" required />
            </label>
            <FieldError message={errors.email} />
            <label>
                Password
                <input name="password" type="password" autoComplete="new-password" required />
            </label>
            <FieldError message={errors.password} />
            <label>
                Confirm password
                <input name="confirmPassword" type="password" autoComplete="new-password" required />
            </label>
            <FieldError message={errors.confirmPassword} />
            <p>
                <button type="submit">Create account</button>
            </p>
        </form>
    </Layout>
);

export default RegisterPage;
