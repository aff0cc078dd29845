export { archiveChannels } from './archiver/channelArchiver';
export type { ArchiverClient, DomainResolver } from './archiver/channelArchiver';
export { classifyChannel, isArchiveVerdict, keepVerdict, DAY_MS } from './classification/classifyChannel';
export type { ChannelSignals, ClassificationPolicy } from './classification/classifyChannel';
export { createArchivePolicy, parseArgs, policyFromArgs, resolveApiToken } from './config';
export type { ArchivePolicyInput, ParsedArgs } from './config';
export { UserDirectory } from './directory/userDirectory';
export type { UserLookup } from './directory/userDirectory';
export { ConfigError, RemoteError } from './errors';
export type { RemoteErrorCategory, RemoteResult } from './errors';
export { runChannelSweep } from './main';
export { displayReport, formatRecordLine, summarizeActions } from './report/consoleReport';
export { toCsv, writeCsvReport } from './report/csvReport';
export { WorkspaceClient, createWebClient } from './slack/workspaceClient';
export type { SlackApi, WorkspaceClientOptions } from './slack/workspaceClient';
export * from './types';
