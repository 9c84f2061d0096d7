/**
 * HTTP Archive shapes as they appear in a capture file. Only the fields the
 * replay engine reads are typed.
 */

export type HarHeader = {
  name: string;
  value: string;
};

export type HarCookie = {
  name: string;
  value: string;
};

export type HarPostData = {
  mimeType?: string;
  text?: string;
};

export type HarRequest = {
  method: string;
  url: string;
  headers: HarHeader[];
  cookies?: HarCookie[];
  postData?: HarPostData;
};

export type HarContent = {
  mimeType?: string;
  text?: string;
  encoding?: string;
};

export type HarResponse = {
  status: number;
  statusText?: string;
  headers: HarHeader[];
  content?: HarContent;
  redirectURL?: string;
};

export type HarEntry = {
  request: HarRequest;
  response: HarResponse;
};

export type HarCreator = {
  name: string;
  version?: string;
};

export type Capture = {
  log: {
    version?: string;
    creator?: HarCreator;
    entries: HarEntry[];
  };
};

export type LoadedCapture = Capture & {
  sourcePath: string;
};
