import type { ComponentGenerator } from '../types/generator.js';
import { pythonGenerator } from './python.js';
import { nodeGenerator } from './node.js';
import { fastapiGenerator } from './fastapi.js';
import { nextjsGenerator } from './nextjs.js';
import { expressGenerator } from './express.js';
import { chromaGenerator, mongodbGenerator, postgresqlGenerator, redisGenerator } from './services.js';

export const GENERATORS = {
  python: pythonGenerator,
  node: nodeGenerator,
  fastapi: fastapiGenerator,
  nextjs: nextjsGenerator,
  express: expressGenerator,
  postgresql: postgresqlGenerator,
  mongodb: mongodbGenerator,
  redis: redisGenerator,
  chroma: chromaGenerator,
} satisfies Record<string, ComponentGenerator>;
