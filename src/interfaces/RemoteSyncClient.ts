/**
 * Interface for a remote host reached over SSH, with rsync for file transfer
 */
export interface RemoteSyncClient {
  /** Run a shell command on the remote host and return its stdout */
  runCommand(command: string): Promise<string>;

  /** Mirror a local directory into a remote directory */
  upload(localDir: string, remoteDir: string): Promise<void>;

  /** Mirror a remote directory into a local directory */
  download(remoteDir: string, localDir: string): Promise<void>;

  /** Open and close a session */
  testConnection(): Promise<boolean>;
}
