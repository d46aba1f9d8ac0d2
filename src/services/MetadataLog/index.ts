export * from "./formatLog";
export * from "./MetadataLogWriter";
export * from "./MetadataLogWriterFile";
