export interface UrlGeneratorPort {
  absolute(routeName: string, parameters: Record<string, string>): string;
}
