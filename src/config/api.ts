export const API_CONFIG = {
  BASE_DOMAIN: 'https://www.skyscanner.net',
  ENDPOINTS: {
    // poll requests append the session id
    UNIFIED_SEARCH: 'https://www.skyscanner.net/g/radar/api/v2/unified-search/',
    SEARCH_ORIGIN: 'https://www.skyscanner.net/g/autosuggest-search/api/v1/search-flight-origin',
    LOCATION_SEARCH: 'https://www.skyscanner.net/g/autosuggest-carhire/{market}/{locale}/',
    ITINERARY_DETAILS: 'https://www.skyscanner.net/g/sttc/itinerary-details/v1/itinerary',
    CAR_RENTAL:
      'https://www.skyscanner.net/g/carhire-quotes/{market}/{locale}/{currency}/{driverAge}/{firstLocation}/{secondLocation}/{firstDate}/{secondDate}/'
  },
  ROUTES: {
    FLIGHTS: '/api/flights',
    LOCATIONS: '/api/locations',
    CAR_RENTAL: '/api/car-rental',
    HEALTH: '/api/health'
  }
} as const;

export const ANDROID_CLIENT = {
  CHANNEL_ID: 'goandroid',
  DEVICE: 'Android-phone',
  DEVICE_CLASS: 'phone',
  CLIENT_TYPE: 'net.skyscanner.android.main',
  PX_SDK_VERSION: '3.4.4'
} as const;

export const CAR_RENTAL_DEFAULT_PARAMS: Readonly<Record<string, string>> = {
  group: 'true',
  sipp_map: 'true',
  channel: 'android',
  vndr_img_rounded: 'true',
  ranking_enable: 'false',
  reqn: '0',
  version: '6.9',
  include_location: 'true',
  city_search_enable: 'true'
};

export const DRIVER_AGE = {
  OVER_25: '30',
  UNDER_25: '21'
} as const;

/** Fills `{placeholder}` segments of an endpoint template. */
export const fillTemplate = (template: string, values: Record<string, string>): string =>
  template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new Error(`Missing value for ${match} in endpoint template`);
    }
    return encodeURIComponent(value).replace(/%2C/g, ',').replace(/%3A/g, ':');
  });

export default API_CONFIG;
