import type { FileDescriptorObject } from "../schema/descriptors.js"

/**
 * A proto3 file covering nested types, a map field, an enum at each level,
 * and extensions at file and message scope.
 */
export const SHOP_PROTO: FileDescriptorObject = {
  name: "foo/bar/shop.proto",
  package: "foo.bar",
  syntax: "proto3",
  message_type: [
    {
      name: "Order",
      field: [
        { name: "order_id", number: 1, label: 1, type: 4, options: { jstype: 1 } },
        { name: "items", number: 2, label: 3, type: 11, type_name: ".foo.bar.Order.Item" },
        { name: "tags", number: 3, label: 3, type: 11, type_name: ".foo.bar.Order.TagsEntry" }
      ],
      nested_type: [
        { name: "Item", field: [{ name: "sku", number: 1, label: 1, type: 9 }] },
        {
          name: "TagsEntry",
          options: { map_entry: true },
          field: [
            { name: "key", number: 1, label: 1, type: 9 },
            { name: "value", number: 2, label: 1, type: 9 }
          ]
        }
      ],
      enum_type: [{ name: "Status" }],
      extension: [
        { name: "order_note", number: 100, label: 1, type: 9, extendee: ".foo.bar.Target" }
      ]
    },
    { name: "Target" }
  ],
  enum_type: [{ name: "Currency" }],
  extension: [{ name: "shop_flag", number: 101, label: 1, type: 8, extendee: ".foo.bar.Target" }]
}
