/**
 * IAudioConverter - Port for normalizing audio to 16 kHz mono PCM WAV.
 * Implementations: FFmpegAudioConverter
 */
export interface IAudioConverter {
    /**
     * Writes a WAV version of `inputPath` to `outputPath`.
     * Rejects with ConversionError when the tool is missing or fails.
     */
    convertToWav(inputPath: string, outputPath: string): Promise<void>;
}
