import fs from 'fs';
import path from 'path';
import { Router } from 'express';
import { z } from 'zod';

const pkgSchema = z.object({ version: z.string() });
// same relative path from src/routes and dist/routes
const pkg = pkgSchema.parse(JSON.parse(fs.readFileSync(path.resolve(__dirname, '../../package.json'), 'utf8')));

const r = Router();
r.get('/health', (_req, res) => res.json({ ok: true, version: pkg.version, uptimeSeconds: Math.floor(process.uptime()) }));
export default r;
