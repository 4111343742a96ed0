export interface TextOutputSink {
  emit(text: string): Promise<void>;
}
