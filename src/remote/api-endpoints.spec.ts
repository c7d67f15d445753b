import OpenmlEndpoints from './api-endpoints';

describe('OpenmlEndpoints', () => {
  it('builds the dataset urls under the default host', () => {
    const endpoints = new OpenmlEndpoints();
    expect(endpoints.descriptionEndpoint(61).toString()).toBe(
      'https://www.openml.org/api/v1/json/data/61',
    );
    expect(endpoints.featuresEndpoint(61).toString()).toBe(
      'https://www.openml.org/api/v1/json/data/features/61',
    );
    expect(endpoints.tasksEndpoint(61).toString()).toBe(
      'https://www.openml.org/api/v1/json/task/list/data_id/61',
    );
    expect(endpoints.csvEndpoint(61).toString()).toBe('https://www.openml.org/data/v1/get_csv/61');
    expect(endpoints.arffEndpoint('61').toString()).toBe('https://www.openml.org/data/v1/download/61');
  });

  it('appends the api key to every url', () => {
    const endpoints = new OpenmlEndpoints({ baseUrl: 'http://openml.test', apiKey: 'test-secret' });
    expect(endpoints.descriptionEndpoint(3).toString()).toBe(
      'http://openml.test/api/v1/json/data/3?api_key=test-secret',
    );
  });
});
