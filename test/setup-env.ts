import 'reflect-metadata';

process.env.OPENAI_API_KEY ??= 'test-key';
