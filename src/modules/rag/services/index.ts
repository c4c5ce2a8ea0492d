export * from './retrieval.service';
export * from './document-loader.service';
