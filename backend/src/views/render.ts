import type { Response } from 'express';
import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

export function renderPage(page: ReactElement): string {
    return `<!DOCTYPE html>${renderToStaticMarkup(page)}`;
}

export function sendPage(res: Response, page: ReactElement, status = 200): void {
    res.status(status).type('html').send(renderPage(page));
}
