export abstract class ImageSourcePort {
  /** Descarga el archivo a disco y devuelve la ruta local, o null si falla. */
  abstract download(fileId: string): Promise<string | null>;
  abstract discard(localPath: string): Promise<void>;
  abstract cleanup(): Promise<void>;
}
