export * from './IDownloader';
