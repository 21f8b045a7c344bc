import { constants } from 'node:fs';
import { access, readFile } from 'node:fs/promises';
import { extname, join, normalize } from 'node:path';

export const ACCESS_DENIED_HTML =
  '<h1>🔒 Access Denied</h1><p>Add <code>?key=YOUR_PASSWORD</code> to the URL.</p>';

export interface StaticAsset {
  content: string;
  contentType: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Serves the dashboard UI from the /public directory
 */
export class DashboardService {
  private readonly publicPath: string;
  private readonly apiBasePath: string;

  // MIME types of the files shipped in /public
  private readonly mimeTypes: Record<string, string> = {
    '.html': 'text/html',
    '.css': 'text/css',
    '.js': 'application/javascript',
    '.json': 'application/json',
    '.svg': 'image/svg+xml',
    '.ico': 'image/x-icon',
  };

  constructor(params?: { publicPath?: string; apiBasePath?: string }) {
    // Public directory is at the root of the project
    this.publicPath = params?.publicPath ?? join(process.cwd(), 'public');
    this.apiBasePath = params?.apiBasePath ?? '/api';
  }

  /**
   * Dashboard HTML with the API base path and the access key injected into meta tags
   */
  public async renderIndex(accessKey: string): Promise<string | null> {
    const content = await this.readPublicFile('index.html');
    if (content === null) {
      return null;
    }

    return content
      .replace(
        '<meta name="api-base-path" content="">',
        `<meta name="api-base-path" content="${escapeHtml(this.apiBasePath)}">`,
      )
      .replace(
        '<meta name="access-key" content="">',
        `<meta name="access-key" content="${escapeHtml(accessKey)}">`,
      );
  }

  /**
   * Static file from the public directory, null when missing or outside of it
   */
  public async readAsset(filename: string): Promise<StaticAsset | null> {
    // Prevent directory traversal attacks
    const normalizedFilename = normalize(filename).replace(/^(\.\.(\/|\\|$))+/, '');
    if (normalizedFilename.includes('..') || normalizedFilename === 'index.html') {
      return null;
    }

    const content = await this.readPublicFile(normalizedFilename);
    if (content === null) {
      return null;
    }

    const ext = extname(normalizedFilename).toLowerCase();
    return {
      content,
      contentType: `${this.mimeTypes[ext] ?? 'application/octet-stream'}; charset=utf-8`,
    };
  }

  private async readPublicFile(filename: string): Promise<string | null> {
    const filePath = join(this.publicPath, filename);
    try {
      await access(filePath, constants.R_OK);
    } catch {
      return null;
    }
    return readFile(filePath, 'utf-8');
  }
}
