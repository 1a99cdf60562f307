export interface VideoInfo {
  id: string;
  title: string;
  description: string;
  url: string;
  duration?: number | undefined;
  thumbnail?: string | undefined;
  uploader?: string | undefined;
}

export interface DownloadResult {
  filePath: string;
  videoInfo: VideoInfo;
}

export interface PageVideo {
  url: string;
  title: string;
}

/** Netscape cookies.txt, given inline (web form) or as a file path (CLI). */
export type CookieSource = { content: string } | { path: string };

export interface ExtractOptions {
  cookies?: CookieSource | undefined;
}

/** A command-line extractor that turns a video URL into a local media file. */
export interface Extractor {
  download(url: string, outDir: string, options?: ExtractOptions): Promise<DownloadResult>;
  listVideos(pageUrl: string, options?: ExtractOptions & { maxVideos?: number }): Promise<PageVideo[]>;
}
