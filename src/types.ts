export type ImageDescriptor = {
  readonly url: string; // absolute image URL
  readonly page: string; // page the image was found on
  readonly depth: number; // link hops from the seed
};

export type LinkTarget = string; // raw href, not yet resolved

export type FrontierEntry = {
  url: string;
  depth: number;
};

export type Traversal = 'breadth-first' | 'depth-first';

export type CrawlConfig = {
  imageCap?: number; // images kept per page fetch
  traversal?: Traversal;
};

export type CrawlResult = {
  images: ImageDescriptor[];
  visited: string[]; // fetched URLs in visit order
  failed: string[]; // URLs whose fetch failed
};

export type ImageMetadata = {
  images: ImageDescriptor[];
};

export type FilenameStrategy = 'url' | 'content-type';

export type MaterializeConfig = {
  outDir: string;
  concurrency?: number;
  filenames?: FilenameStrategy;
  writeEmptyMetadata?: boolean;
};

export type DownloadSummary = {
  downloaded: number;
  duplicates: number;
  skipped: number; // inline data URIs
  failed: number;
  files: string[]; // written paths, completion order
};
