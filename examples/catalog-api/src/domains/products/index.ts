export { createProductsModule } from "./api"
export type { Order, Product, ProductPage, SearchCriteria } from "./model/product.model"
export { OrderBook } from "./services/order-book"
export { loadProducts, ProductCatalog } from "./services/product-catalog"
