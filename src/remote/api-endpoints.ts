import { OPENML_API_PATH, OPENML_BASE_URL, OPENML_DATA_PATH } from '../constants';

interface IOpenmlEndpointsParams {
  baseUrl?: string;
  apiKey?: string;
}

/** Utility class for constructing OpenML REST urls given a provided baseUrl and api key */
export default class OpenmlEndpoints {
  private readonly baseUrl: string;

  constructor(private readonly params: IOpenmlEndpointsParams = {}) {
    this.baseUrl = params.baseUrl ?? OPENML_BASE_URL;
  }

  endpoint(resource: string): URL {
    const url = new URL(this.baseUrl + resource);
    if (this.params.apiKey) {
      url.searchParams.append('api_key', this.params.apiKey);
    }
    return url;
  }

  descriptionEndpoint(datasetId: number): URL {
    return this.endpoint(`${OPENML_API_PATH}/data/${datasetId}`);
  }

  featuresEndpoint(datasetId: number): URL {
    return this.endpoint(`${OPENML_API_PATH}/data/features/${datasetId}`);
  }

  tasksEndpoint(datasetId: number): URL {
    return this.endpoint(`${OPENML_API_PATH}/task/list/data_id/${datasetId}`);
  }

  csvEndpoint(fileId: string | number): URL {
    return this.endpoint(`${OPENML_DATA_PATH}/get_csv/${fileId}`);
  }

  arffEndpoint(fileId: string | number): URL {
    return this.endpoint(`${OPENML_DATA_PATH}/download/${fileId}`);
  }
}
