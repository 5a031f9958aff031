import 'dotenv/config';
import express, { type NextFunction, type Request, type Response } from 'express';
import session from 'cookie-session';
import { router as web } from './web/routes.js';
import { authRouter } from './auth/google.js';
import { errorMessage } from './util/errors.js';

const sessionSecret = process.env.SESSION_SECRET?.trim();
if (!sessionSecret) {
  throw new Error('SESSION_SECRET must be set (see .env.example)');
}

const app = express();

app.use((req, res, next) => {
  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const delta = Number(process.hrtime.bigint() - start) / 1_000_000;
    const formatted = delta.toFixed(1);
    console.log(
      `[http] ${req.method} ${req.originalUrl} -> ${res.statusCode} ${formatted}ms`
    );
  });
  next();
});

app.use(session({
  name: 'sess',
  secret: sessionSecret,
  maxAge: 7 * 24 * 60 * 60 * 1000
}));

app.use(express.urlencoded({ extended: true }));
app.use(express.json());

app.use('/auth', authRouter);
app.use('/', web);

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  console.error('unhandled request error', err);
  res.status(500).type('text/plain').send(`Something went wrong: ${errorMessage(err)}`);
});

const port = Number(process.env.PORT) || 3000;
app.listen(port, () => console.log(`http://localhost:${port}`));
