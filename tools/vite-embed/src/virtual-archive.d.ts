/** Module provided by the embeddedAssets() Vite plugin. */
declare module 'virtual:gamepak-archive' {
  const base64: string;
  export default base64;
}
