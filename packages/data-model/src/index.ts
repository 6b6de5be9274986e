export * from './schemas/comics/envelope';
export * from './schemas/comics/character';
export * from './schemas/comics/story';
