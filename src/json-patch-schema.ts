/** The JSON Patch documents a PatchSet marshals to, when it isn't `null`. */
export default {
  "type": "array",
  "items": {
    "oneOf": [ {
      "type": "object",
      "properties": {
        "op": { "enum": [ "test" ]},
        "path": { "type": "string", "format": "json-pointer" },
        "value": {}
      },
      "required": [ "op", "path", "value" ]
    }, {
      "type": "object",
      "properties": {
        "op": { "enum": [ "remove" ]},
        "path": { "type": "string", "format": "json-pointer" }
      },
      "required": [ "op", "path" ]
    } ]
  }
}
