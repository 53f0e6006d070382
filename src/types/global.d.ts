/** Package version, injected at build time by Vite and at test time by Vitest */
declare const __APP_VERSION__: string;
