export const SEARCH_RESULTS_HTML = `
  <html><body>
    <div data-testid="property-card">
      <h3><div data-testid="title">Hotel Central</div></h3>
      <span data-testid="address">Centru, București</span>
      <div data-testid="review-score"><div>Scored 8,7</div></div>
      <span data-testid="price-and-discounted-price">1.234 lei</span>
      <a data-testid="title-link" href="/hotel/ro/central.html?aid=1">Hotel Central</a>
      <img src="https://img.example/central.jpg" />
      <ul data-testid="property-card-unit-configuration"><li>Wi-Fi</li><li> Parcare </li></ul>
    </div>
    <div data-testid="property-card">
      <h3><div data-testid="title">Sold Out Inn</div></h3>
      <span data-testid="address">Lipscani</span>
    </div>
    <div data-testid="property-card">
      <h3>Vila Mara</h3>
      <span data-testid="price-and-discounted-price">€ 95</span>
      <a href="https://www.booking.com/hotel/ro/mara.html">Vila Mara</a>
    </div>
  </body></html>
`;
