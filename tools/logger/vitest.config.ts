import { defineConfig as defineBaseConfig } from '@ocrean/vitest-config';
import { defineConfig } from 'vitest/config';

export default defineConfig(defineBaseConfig());
