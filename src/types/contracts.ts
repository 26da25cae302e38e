export type GenerationRole = "writing" | "fact_check" | "expander";

export type BackendName = "ollama" | "openai";

export interface GenerationRequest {
  readonly prompt: string;
  /** Unrecognized roles resolve to "writing". */
  readonly role?: string;
  readonly temperature?: number;
  readonly systemPrompt?: string;
  readonly maxRetries?: number;
}

export interface ResolvedGenerationRequest {
  readonly prompt: string;
  readonly role: GenerationRole;
  readonly temperature: number;
  readonly systemPrompt: string;
  readonly maxRetries: number;
}

export interface ITextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface IGenerationBackend {
  readonly name: BackendName;
  generate(request: ResolvedGenerationRequest): Promise<string>;
}

export interface ILocalGenerationBackend extends IGenerationBackend {
  isAvailable(): Promise<boolean>;
}

export interface AudioStreamHandlers {
  onFrame(pcm16: Buffer): void;
  onError(error: Error): void;
}

export interface IAudioStream {
  readonly device: string | undefined;
  close(): Promise<void>;
}

export interface IAudioSource {
  open(device: string | undefined, handlers: AudioStreamHandlers): Promise<IAudioStream>;
  findFallbackDevice(exclude: string | undefined): Promise<string | undefined>;
}

export interface ITranscriber {
  transcribe(audioPath: string): Promise<string>;
}

export interface CapsuleLogEntry {
  title: string;
  transcript: string;
  capsule: string;
  tags: string[];
  timestamp: Date;
}

export interface ICapsuleStore {
  saveLog(entry: CapsuleLogEntry): Promise<string>;
  extractTags(text: string): string[];
  appendSection(logPath: string, sectionTitle: string, content: string): Promise<void>;
}

export interface InsightMetadata {
  title: string;
  tags: string[];
  timestamp: string;
  logPath: string;
}

export interface InsightSearchHit {
  id: string;
  text: string;
  metadata: InsightMetadata;
  score: number;
}

export interface IInsightIndex {
  add(id: string, transcript: string, capsule: string, metadata: InsightMetadata): Promise<boolean>;
  search(query: string, limit: number): Promise<InsightSearchHit[]>;
  count(): number;
}

export type PipelineState = "idle" | "recording" | "processing";

export interface ProcessingResult {
  success: boolean;
  audioPath: string;
  transcript: string;
  title: string;
  capsule: string;
  tags: string[];
  logPath: string;
  error?: string;
}

export interface PipelineObserver {
  onRecordingStart(): void;
  onRecordingStop(): void;
  onProcessingStart(): void;
  onProcessingComplete(result: ProcessingResult): void;
  onError(message: string): void;
}
