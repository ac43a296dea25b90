/** One file listed by a download manifest. */
export interface DownloadFile {
  /** Path or absolute URL, resolved against the manifest's `baseUrl` */
  remotePath: string;
  /** Name of the file inside the destination directory */
  localFileName: string;
  /** Size in bytes advertised by the catalog */
  expectedSize: number;
  checksum: string;
  checksumAlgorithm: string;
}
