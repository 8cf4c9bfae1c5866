// Content generation (public, CORS enabled)
export { default as generateContent } from './content/generate';
