import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import * as path from "path";
import * as fs from "fs";
import {
    BionicError,
    BionicErrorType,
    DocumentErrorPolicy,
    Logger,
    convertEpubBuffer,
    describeError,
    parseOptionFields,
} from "./bionic";
import { loadConfig, ServerConfig } from "./config";

function formField(body: unknown, key: string): string | undefined {
    if (typeof body !== "object" || body === null) return undefined;
    const value: unknown = Reflect.get(body, key);
    return typeof value === "string" ? value : undefined;
}

function errorPolicy(value: string | undefined): DocumentErrorPolicy {
    return value === "abort" ? "abort" : "skip";
}

// Errors caused by the upload itself rather than by the server
const CLIENT_ERRORS = new Set<BionicErrorType>([
    BionicErrorType.INVALID_PACKAGE,
    BionicErrorType.INVALID_OPTIONS,
    BionicErrorType.ABORTED,
]);

export function createApp(config: ServerConfig, logger: Logger = console) {
    const app = express();

    const upload = multer({
        dest: config.uploadsDir,
        limits: { fileSize: config.maxUploadBytes },
    });

    app.use(express.static("public"));
    app.use(express.json());

    // Request logging middleware
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
        next();
    });

    app.get("/api/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Upload an EPUB and convert it
    app.post("/api/convert", upload.single("epub"), async (req: Request, res: Response) => {
        if (!req.file) {
            return res.status(400).json({ error: "No file uploaded" });
        }

        const filePath = req.file.path;
        const originalName = path.basename(req.file.originalname);
        logger.log(`Converting ${originalName} (${req.file.size} bytes)`);

        try {
            const bionicOptions = parseOptionFields({
                fraction: formField(req.body, "fraction"),
                exclude: formField(req.body, "exclude"),
                hyphens: formField(req.body, "hyphens"),
                apostrophes: formField(req.body, "apostrophes"),
                emphasisTag: formField(req.body, "emphasisTag"),
            });
            const buffer = fs.readFileSync(filePath);
            const { buffer: converted, report } = await convertEpubBuffer(buffer, {
                ...bionicOptions,
                onDocumentError: errorPolicy(formField(req.body, "onError")),
                logger,
            });

            if (!fs.existsSync(config.outputDir)) {
                fs.mkdirSync(config.outputDir, { recursive: true });
            }
            // Multer's random file id keeps same-named uploads apart
            const parsed = path.parse(originalName);
            const outputName = `${parsed.name}_bionic_${req.file.filename}${parsed.ext || ".epub"}`;
            fs.writeFileSync(path.join(config.outputDir, outputName), converted);

            res.json({
                success: true,
                downloadUrl: `/api/download/${encodeURIComponent(outputName)}`,
                report,
            });
        } catch (error) {
            logger.error("Error converting EPUB:", describeError(error));
            const status = error instanceof BionicError && CLIENT_ERRORS.has(error.type) ? 400 : 500;
            res.status(status).json({ error: "Failed to convert EPUB", details: describeError(error) });
        } finally {
            fs.rmSync(filePath, { force: true });
        }
    });

    // Download a converted EPUB
    app.get("/api/download/:filename", (req: Request, res: Response) => {
        const filename = path.basename(req.params.filename ?? "");
        const filePath = path.join(config.outputDir, filename);

        if (!filename || !fs.existsSync(filePath)) {
            logger.error(`File not found: ${filePath}`);
            return res.status(404).json({ error: "File not found", requested: filename });
        }

        res.download(filePath, (err: Error | null) => {
            if (err) {
                logger.error("Error downloading file:", err);
                if (!res.headersSent) {
                    res.status(500).json({ error: "Failed to download file" });
                }
                return;
            }
            // Converted books are served once
            fs.rmSync(filePath, { force: true });
        });
    });

    // Upload errors (size limit, unexpected field) and anything else thrown by middleware
    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            return next(err);
        }
        if (err instanceof multer.MulterError) {
            const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
            return res.status(status).json({ error: "Upload rejected", details: err.message });
        }
        logger.error("Unhandled error:", describeError(err));
        res.status(500).json({ error: "Internal server error", details: describeError(err) });
    });

    return app;
}

if (require.main === module) {
    const config = loadConfig();
    const app = createApp(config);

    process.on("uncaughtException", (error) => {
        console.error("UNCAUGHT EXCEPTION:", error);
    });

    app.listen(config.port, () => {
        console.log(`Server running on http://localhost:${config.port}`);
    });
}
