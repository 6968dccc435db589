import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { GenerationOrchestrator } from '../application/GenerationOrchestrator';
import { VideoGenerationJob } from '../application/services/VideoGenerationJob';
import { ModelCapabilityRegistry } from '../domain/services/ModelCapabilityRegistry';
import { IArtifactStore } from '../domain/ports/IArtifactStore';
import { IVideoJobProvider } from '../domain/ports/IVideoJobProvider';

// Infrastructure imports
import { ElevenLabsSpeechSynthesizer } from '../infrastructure/tts/ElevenLabsSpeechSynthesizer';
import { SupabaseArtifactStore } from '../infrastructure/storage/SupabaseArtifactStore';
import { CloudinaryArtifactStore } from '../infrastructure/storage/CloudinaryArtifactStore';
import { ReplicateVideoJobProvider } from '../infrastructure/video/ReplicateVideoJobProvider';
import { DIdTalksJobProvider } from '../infrastructure/video/DIdTalksJobProvider';
import { FFmpegMuxer } from '../infrastructure/media/FFmpegMuxer';
import { SupabaseMetadataRecorder } from '../infrastructure/persistence/SupabaseMetadataRecorder';
import { MediaDownloader } from '../infrastructure/http/MediaDownloader';
import { MediaInspector } from '../infrastructure/http/MediaInspector';

// Route imports
import { createGenerationRoutes } from './routes/generationRoutes';
import { createModelRoutes } from './routes/modelRoutes';
import { createDebugRoutes } from './routes/debugRoutes';
import { requireAuth } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';

export interface AppDependencies {
    registry: ModelCapabilityRegistry;
    orchestrator: GenerationOrchestrator;
    inspector: MediaInspector;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors({ origin: config.allowedOrigin === '*' ? '*' : config.allowedOrigin.split(',').map((o) => o.trim()) }));
    app.use(express.json({ limit: '1mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({ ok: true });
    });

    // Routes
    app.use(createModelRoutes(deps.registry));
    const auth = requireAuth(config);
    app.use('/jobs', auth);
    app.use('/debug', auth);
    app.use(createGenerationRoutes(deps.orchestrator, deps.registry));
    app.use(createDebugRoutes(deps.inspector));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): AppDependencies {
    const registry = new ModelCapabilityRegistry();
    const inspector = new MediaInspector();

    const speechSynthesizer = new ElevenLabsSpeechSynthesizer({
        apiKey: config.elevenApiKey,
        baseUrl: config.elevenBaseUrl,
        modelId: config.elevenModelId,
        outputFormat: config.ttsOutputFormat,
        maxChars: config.ttsMaxChars,
        maxRetries: config.providerMaxRetries,
    });

    const videoJob = new VideoGenerationJob(createVideoProviders(config, inspector), registry);

    const orchestrator = new GenerationOrchestrator(
        {
            registry,
            speechSynthesizer,
            artifactStore: createArtifactStore(config),
            videoJob,
            muxer: new FFmpegMuxer(),
            metadataRecorder: new SupabaseMetadataRecorder({
                url: config.supabaseUrl,
                serviceRole: config.supabaseServiceRole,
                table: config.supabaseRecordsTable,
            }),
            mediaDownloader: new MediaDownloader(),
        },
        {
            pollIntervalMs: config.videoPollIntervalMs,
            timeoutMs: config.videoTimeoutMs,
            ttsOutputFormat: config.ttsOutputFormat,
            mux: {
                audioLeadDelaySeconds: config.audioLeadDelaySeconds,
                audioTailPadSeconds: config.audioTailPadSeconds,
            },
        }
    );

    return { registry, orchestrator, inspector };
}

// --- Helper Functions ---

function createArtifactStore(config: Config): IArtifactStore {
    if (config.storageProvider === 'cloudinary') {
        console.log('✅ Cloudinary storage configured');
        return new CloudinaryArtifactStore({
            cloudName: config.cloudinaryCloudName,
            apiKey: config.cloudinaryApiKey,
            apiSecret: config.cloudinaryApiSecret,
        });
    }
    console.log(`✅ Supabase storage configured (bucket: ${config.supabaseBucket})`);
    return new SupabaseArtifactStore({
        url: config.supabaseUrl,
        serviceRole: config.supabaseServiceRole,
        bucket: config.supabaseBucket,
    });
}

function createVideoProviders(config: Config, inspector: MediaInspector): IVideoJobProvider[] {
    const providers: IVideoJobProvider[] = [new ReplicateVideoJobProvider(config.replicateApiToken)];
    if (config.didApiKey) {
        console.log('🗣️ D-ID talking-head provider enabled');
        providers.push(new DIdTalksJobProvider(config.didApiKey, config.didBaseUrl, inspector));
    } else {
        console.log('⚠️  D-ID not configured; d-id/talks requests will fail as unavailable.');
    }
    return providers;
}
