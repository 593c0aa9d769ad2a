import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { z } from 'zod';
import type { SessionCoordinator } from '../kernel-core/Session.js';
import { RequestValidationError, translateError } from '../Platform/Errors.js';
import type { Logger } from '../Platform/Logger.js';
import { silentLogger } from '../Platform/Logger.js';
import { FrequencyNamespace } from '../Platform/Ports.js';

const ProcessRequest = z.object({
    text: z.string()
});

const ConfirmRequest = z.object({
    text: z.string(),
    key: z.array(z.number().int()).min(1)
});

const DialRequest = z.object({
    key: z.array(z.number().int()).min(1),
    firstKnob: z.number().int().min(1),
    knobs: z.array(z.number().int()).min(1)
});

const FrequencyQuery = z.object({
    namespace: z.nativeEnum(FrequencyNamespace),
    length: z.coerce.number().int().min(1)
});

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw new RequestValidationError(
            parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
        );
    }
    return parsed.data;
}

/**
 * HTTP surface for the interactive layer: it posts corrected text and
 * confirmed keys, and renders the outcomes it gets back.
 */
export class DecoderServer {
    private app: express.Express;
    private server: Server | null = null;

    constructor(
        private session: SessionCoordinator,
        private port: number = 3000,
        private logger: Logger = silentLogger
    ) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public start(): Promise<Server> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, () => {
                this.logger.info({ port: this.boundPort }, 'DecoderServer: Listening');
                resolve(server);
            });
            server.once('error', reject);
            this.server = server;
        });
    }

    public stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    /**
     * Stops listening, then closes the session. Failures of either step are
     * logged; the returned promise never rejects.
     */
    public shutdown(): Promise<void> {
        return this.stop()
            .catch(e => this.logger.error(e, 'DecoderServer: Stop failed'))
            .finally(() => this.session.close())
            .catch(e => this.logger.error(e, 'DecoderServer: Close failed'));
    }

    /** Actual port once listening; differs from the configured one when that was 0. */
    public get boundPort(): number | null {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : null;
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            this.logger.debug({ method: req.method, url: req.url }, 'DecoderServer: Request');
            next();
        });

        this.app.get('/health', (_req, res) => {
            res.json({ status: 'ok', timestamp: new Date().toISOString() });
        });

        // Corrected text in, outcome out
        this.app.post('/messages', (req, res) => {
            const { text } = validate(ProcessRequest, req.body);
            res.json(this.session.process(text));
        });

        // Operator-confirmed decode fed back into the vocabulary
        this.app.post('/messages/confirm', (req, res) => {
            const { text, key } = validate(ConfirmRequest, req.body);
            res.json(this.session.confirm(text, key));
        });

        // Dial positions for a chosen key, from the knobs as they read now
        this.app.post('/keys/dial', (req, res) => {
            const { key, firstKnob, knobs } = validate(DialRequest, req.body);
            res.json(this.session.dial(key, firstKnob, knobs));
        });

        this.app.get('/frequency/:namespace', (req, res) => {
            const { namespace, length } = validate(FrequencyQuery, { namespace: req.params.namespace, length: req.query.length });
            res.json({ namespace, length, candidates: this.session.Frequency.candidatesOfLength(length, namespace) });
        });

        this.app.get('/seen/:fingerprint', (req, res) => {
            const { fingerprint } = req.params;
            res.json({ fingerprint, seen: this.session.Seen.contains(fingerprint) });
        });

        const onError: express.ErrorRequestHandler = (err, _req, res, _next) => {
            const failure = err instanceof SyntaxError
                ? new RequestValidationError('Malformed JSON body')
                : translateError(err);
            if (failure.status >= 500) this.logger.error(failure, `DecoderServer: ${failure.code}`);
            res.status(failure.status).json({ error: failure.message, code: failure.code });
        };
        this.app.use(onError);
    }
}
