export * from './services/crawler/interfaces/types';
export type { IArtifactWriter } from './services/crawler/interfaces/IArtifactWriter';
export type { IContentExtractor } from './services/crawler/interfaces/IContentExtractor';
export type { ICrawler } from './services/crawler/interfaces/ICrawler';
export type { IFetcher } from './services/crawler/interfaces/IFetcher';
export type { IFrontier } from './services/crawler/interfaces/IFrontier';
export type { IProgressReporter } from './services/crawler/interfaces/IProgressReporter';
export type { IStateStore } from './services/crawler/interfaces/IStateStore';
export type { IUrlQueue } from './services/crawler/interfaces/IUrlQueue';
export { CrawlerError, FetchError, PersistenceError, ConfigError } from './services/crawler/errors';
export type { FetchErrorKind } from './services/crawler/errors';
export { AxiosFetcher } from './services/crawler/implementations/AxiosFetcher';
export { CheerioExtractor } from './services/crawler/implementations/CheerioExtractor';
export { Frontier } from './services/crawler/implementations/Frontier';
export { InMemoryUrlQueue } from './services/crawler/implementations/InMemoryUrlQueue';
export { JsonFileStateStore, emptyFrontierState } from './services/crawler/implementations/JsonFileStateStore';
export { LoggingProgressReporter } from './services/crawler/implementations/LoggingProgressReporter';
export { StandardCrawler } from './services/crawler/implementations/StandardCrawler';
export { TextArtifactWriter } from './services/crawler/implementations/TextArtifactWriter';
export { ServiceFactory } from './services/crawler/factories/ServiceFactory';
export type { CrawlerServices } from './services/crawler/factories/ServiceFactory';
export { ArtifactFormatter } from './services/crawler/utils/ArtifactFormatter';
export { ContentFilter } from './services/crawler/utils/ContentFilter';
export { UrlUtils } from './services/crawler/utils/UrlUtils';
export { loadConfig } from './config';
export type { AppConfig } from './config';
