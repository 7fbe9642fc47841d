export * from './catalogStore';
export * from './config';
export * from './constants';
export * from './drive';
export * from './gemini';
export * from './googleAuth';
export * from './instagram';
export * from './logger';
export * from './normalizers';
export * from './sampleData';
export * from './sheetRows';
export * from './sheets';
export * from './types';
export * from './vinylId';
export * from './workflows';
